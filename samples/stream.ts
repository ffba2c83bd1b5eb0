// samples/stream.ts: decode a hex dump of raw MIDI bytes, one byte at a time
import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import * as path from "node:path";
import { MidiStreamParser, parseHexDump } from "../src/index";

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

function main() {
  const dumpPath = path.resolve(__dirname, process.argv[2] ?? "stream.hex");
  const parser = new MidiStreamParser();
  for (const byte of parseHexDump(readFileSync(dumpPath, "utf8"))) {
    const message = parser.push(byte);
    if (message) console.log(message);
  }
}

main();
