import yargs from "yargs";
import { hideBin } from "yargs/helpers";
import { ENV } from "../pipeline/env";
import { planChunks } from "../pipeline/chunk";
import { FfmpegMediaProbe } from "../pipeline/media";
import { toSrtTime } from "../pipeline/timecode";

async function main() {
  const argv = await yargs(hideBin(process.argv))
    .option("media", { type: "string", describe: "probe duration from this file" })
    .option("duration", { type: "number", describe: "media duration in seconds" })
    .option("chunk-sec", { type: "number", default: ENV.chunkSec })
    .option("overlap-sec", { type: "number", default: ENV.overlapSec })
    .check((a) => (a.media || a.duration !== undefined ? true : "Pass --media or --duration"))
    .parse();

  const durationSec = argv.media ? (await new FfmpegMediaProbe().probe(argv.media)).durationSec : Number(argv.duration);
  const chunks = planChunks(durationSec, { chunkSec: argv["chunk-sec"], overlapSec: argv["overlap-sec"] });
  for (const c of chunks) {
    console.log(`${String(c.index).padStart(4, "0")}  ${toSrtTime(c.startSec)} --> ${toSrtTime(c.endSec)}`);
  }
  console.log(`${chunks.length} chunk(s) for ${durationSec}s`);
}

main().catch((e) => {
  console.error(e instanceof Error ? e.toString() : e);
  process.exit(1);
});
