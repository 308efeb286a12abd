#!/usr/bin/env node
import { once } from "node:events";
import { createReadStream, createWriteStream, decodeReadableValues } from "../io/streams.js";
import { SexpStreamWriter } from "../json/sexpWriter.js";
import { parseJsonStream } from "../parser/streamParser.js";
import { formatFile } from "./format.js";
import { countValues, emptyCounts } from "./inspect.js";

const USAGE =
  "Usage: sexp-codec from-json --input <file.json> --output <file.sexp> [--pretty] [--indent <n>] " +
  "or sexp-codec format --input <file.sexp> --output <file.sexp> [--pretty] [--indent <n>] " +
  "or sexp-codec inspect --input <file.sexp>";

const [command, ...args] = process.argv.slice(2);
const consumedArgs = new Set<number>();

const readFlagValue = (flag: string): string | undefined => {
  const index = args.indexOf(flag);
  if (index === -1) {
    return undefined;
  }

  consumedArgs.add(index);
  const value = args[index + 1];
  if (value) {
    consumedArgs.add(index + 1);
  }
  return value;
};

const readSwitch = (flag: string): boolean => {
  const index = args.indexOf(flag);
  if (index === -1) {
    return false;
  }
  consumedArgs.add(index);
  return true;
};

const inputFlag = readFlagValue("--input");
const outputFlag = readFlagValue("--output");
const indentFlag = readFlagValue("--indent");
const pretty = readSwitch("--pretty");
const positionalArgs = args.filter(
  (value, index) => !consumedArgs.has(index) && !value.startsWith("--")
);

const inputPath = inputFlag ?? positionalArgs[0];
const outputPath = outputFlag ?? positionalArgs[1];
const indentWidth = indentFlag === undefined ? 2 : Number(indentFlag);

const usageError = (): void => {
  console.error(USAGE);
  process.exitCode = 1;
};

const abortController = new AbortController();

process.on("SIGINT", () => {
  if (!abortController.signal.aborted) {
    console.error("Aborting: received SIGINT.");
    abortController.abort();
  }
});

const watchStreamError = (
  stream: NodeJS.ReadableStream | NodeJS.WritableStream,
  message: string,
  cleanup: Array<() => void>
): Promise<never> =>
  new Promise((_, reject) => {
    const onError = (error: Error) => {
      reject(new Error(`${message}: ${error.message}`));
    };
    stream.once("error", onError);
    cleanup.push(() => stream.off("error", onError));
  });

const fromJson = async (input: string, output: string, indent: string): Promise<void> => {
  const cleanupHandlers: Array<() => void> = [];
  try {
    console.log(`Input JSON: ${input}`);
    console.log(`Output S-expressions: ${output}`);

    const readStream = createReadStream(input, abortController.signal);
    const writeStream = createWriteStream(output, abortController.signal);
    const streamErrors = [
      watchStreamError(readStream, `Failed to read input file "${input}"`, cleanupHandlers),
      watchStreamError(writeStream, `Failed to write output file "${output}"`, cleanupHandlers),
    ];

    const writer = new SexpStreamWriter(writeStream, { pretty, indent });
    await Promise.race([parseJsonStream(readStream, writer), ...streamErrors]);
    await writer.finalize();
    writeStream.end();
    await once(writeStream, "finish");

    const stats = writer.getStats();
    console.log("Success: output written.");
    console.log("Token Report:");
    console.log(`  Objects:  ${stats.tokens.objects}`);
    console.log(`  Arrays:   ${stats.tokens.arrays}`);
    console.log(`  Keys:     ${stats.tokens.keys}`);
    console.log(`  Strings:  ${stats.tokens.strings}`);
    console.log(`  Numbers:  ${stats.tokens.numbers}`);
    console.log(`  Booleans: ${stats.tokens.booleans}`);
    console.log(`  Nulls:    ${stats.tokens.nulls}`);
    console.log(`  Bytes:    ${stats.bytesWritten}`);
  } finally {
    for (const cleanup of cleanupHandlers) {
      cleanup();
    }
  }
};

/** Re-encodes every top-level list, one per line. Runs on blocking file IO. */
const format = (input: string, output: string, indent: string): void => {
  console.log(`Input S-expressions: ${input}`);
  console.log(`Output S-expressions: ${output}`);

  const result = formatFile(input, output, { pretty, indent });
  console.log(`Success: ${result.values} values written (${result.bytesRead} bytes read).`);
};

const inspect = async (input: string): Promise<void> => {
  const cleanupHandlers: Array<() => void> = [];
  try {
    const readStream = createReadStream(input, abortController.signal);
    const streamError = watchStreamError(
      readStream,
      `Failed to read input file "${input}"`,
      cleanupHandlers
    );
    const counts = emptyCounts();
    const consume = async (): Promise<void> => {
      for await (const value of decodeReadableValues(readStream)) {
        countValues(value, counts);
        counts.items += 1;
      }
    };
    await Promise.race([consume(), streamError]);

    console.log(`Input S-expressions: ${input}`);
    console.log(`  Items:    ${counts.items}`);
    console.log(`  Lists:    ${counts.lists}`);
    console.log(`  Atoms:    ${counts.atoms}`);
    console.log(`  Numbers:  ${counts.numbers}`);
    console.log(`  Booleans: ${counts.booleans}`);
    console.log(`  Nils:     ${counts.nils}`);
    console.log(`  Bytes:    ${readStream.bytesRead}`);
  } finally {
    for (const cleanup of cleanupHandlers) {
      cleanup();
    }
  }
};

const run = async (): Promise<void> => {
  if (!Number.isInteger(indentWidth) || indentWidth < 0) {
    usageError();
    return;
  }
  const indent = " ".repeat(indentWidth);
  try {
    switch (command) {
      case "from-json":
        if (!inputPath || !outputPath) {
          usageError();
          return;
        }
        await fromJson(inputPath, outputPath, indent);
        return;
      case "format":
        if (!inputPath || !outputPath) {
          usageError();
          return;
        }
        format(inputPath, outputPath, indent);
        return;
      case "inspect":
        if (!inputPath) {
          usageError();
          return;
        }
        await inspect(inputPath);
        return;
      default:
        usageError();
    }
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    console.error(message);
    process.exitCode = 1;
  }
};

void run();
