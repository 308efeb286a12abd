import { Writable } from "node:stream";
import { SexpStreamWriter } from "../src/json/sexpWriter.js";

class NullStream extends Writable {
  _write(_chunk: Buffer, _encoding: BufferEncoding, callback: (error?: Error | null) => void): void {
    callback();
  }
}

async function run() {
  const count = 1_000_000;
  const floats = new Float64Array(count);
  for (let i = 0; i < count; i++) {
    // Spread over many magnitudes so both plain and exponent forms of String() show up.
    floats[i] = (Math.random() - 0.5) * 10 ** ((i % 40) - 20);
  }

  const writer = new SexpStreamWriter(new NullStream());

  console.log(`Starting benchmark with ${count} floats...`);
  const start = performance.now();

  await writer.writeStartArray();
  for (let i = 0; i < count; i++) {
    const res = writer.writeNumber(String(floats[i]));
    if (res) await res;
  }
  await writer.writeEndArray();
  await writer.finalize();

  const end = performance.now();
  const duration = end - start;
  const throughput = count / (duration / 1000);

  console.log(`Wrote ${count} floats in ${duration.toFixed(2)}ms`);
  console.log(`Throughput: ${throughput.toFixed(2)} floats/sec`);
  console.log(`Bytes: ${writer.getStats().bytesWritten}`);
}

run().catch(console.error);
