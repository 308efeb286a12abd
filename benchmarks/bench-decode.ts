import { array, f64, record, string } from "../src/binding/shapes.js";
import { decodeValue } from "../src/decoder/decode.js";
import { streamDecoder } from "../src/decoder/stream.js";
import { toString } from "../src/encoder/encode.js";

const Reading = record({ sensor: string, values: array(f64) });

function main() {
  const count = 50_000;
  const lines: string[] = [];
  for (let i = 0; i < count; i++) {
    lines.push(toString({ sensor: `sensor-${i % 97}`, values: [i, i / 3, -i / 7] }, Reading));
  }
  const text = lines.join("\n");
  const bytes = new TextEncoder().encode(text);
  console.log(`Starting benchmark with ${count} values (${bytes.length} bytes)...`);

  let start = process.hrtime.bigint();
  let decoded = 0;
  for (const _value of streamDecoder(bytes, Reading)) {
    decoded++;
  }
  let duration = Number(process.hrtime.bigint() - start) / 1e9;
  console.log(`Typed: ${decoded} values in ${duration.toFixed(3)}s`);
  console.log(`Throughput: ${(bytes.length / duration / 1024 / 1024).toFixed(2)} MiB/sec`);

  start = process.hrtime.bigint();
  const tree = decodeValue(`(${text})`);
  duration = Number(process.hrtime.bigint() - start) / 1e9;
  console.log(`Dynamic: ${tree.type} in ${duration.toFixed(3)}s`);
}

main();
