import yargs from "yargs";
import { hideBin } from "yargs/helpers";
import path from "path";
import { exportAll } from "../pipeline/export";
import { readSpeakerMap, readTranscriptJson, writeExports } from "../pipeline/artifacts";
import { parseFormats } from "./formats";

async function main() {
  const argv = await yargs(hideBin(process.argv))
    .option("transcript", { type: "string", demandOption: true })
    .option("out", { type: "string", demandOption: true })
    .option("speaker-map", { type: "string" })
    .option("formats", { type: "string", default: "srt,vtt,docx,pdf,txt" })
    .parse();

  const file = await readTranscriptJson(argv.transcript);
  const speakerMap = argv["speaker-map"] ? await readSpeakerMap(argv["speaker-map"]) : {};
  const bundle = await exportAll(file.segments, speakerMap, parseFormats(argv.formats));
  const written = await writeExports(path.resolve(argv.out), bundle);
  for (const [format, outPath] of Object.entries(written)) {
    console.log(`${format}:`, outPath);
  }
  for (const f of bundle.failures) console.error(`Export failed: ${f.error.toString()}`);
  if (bundle.failures.length) process.exitCode = 2;
}

main().catch((e) => {
  console.error(e instanceof Error ? e.toString() : e);
  process.exit(1);
});
