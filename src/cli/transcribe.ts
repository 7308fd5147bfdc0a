import yargs from "yargs";
import { hideBin } from "yargs/helpers";
import path from "path";
import { ENV } from "../pipeline/env";
import { withEngines } from "../pipeline/engines";
import { exportAll } from "../pipeline/export";
import { readSpeakerMap, writeExports, writeTranscriptJson } from "../pipeline/artifacts";
import { detectSpeakerCount } from "../pipeline/align";
import { runPipeline } from "../pipeline/run";
import { closeLogFile, error, setLogFile, setLogLevel } from "../pipeline/log";
import { errorMessage } from "../pipeline/errors";
import { parseFormats } from "./formats";

async function main() {
  const argv = await yargs(hideBin(process.argv))
    .option("media", { type: "string", demandOption: true })
    .option("out", { type: "string", default: "artifacts" })
    .option("diarize", { type: "boolean", default: false })
    .option("speaker-map", { type: "string", describe: "JSON file mapping raw labels to names" })
    .option("formats", { type: "string", default: "srt,vtt,docx,pdf,txt" })
    .option("engine", { choices: ["openai", "whisperx"] as const, default: ENV.asrEngine })
    .option("model", { type: "string", default: ENV.asrModel })
    .option("language", { type: "string" })
    .option("on-chunk-failure", { choices: ["fail", "mark"] as const, default: ENV.onChunkFailure })
    .option("log-level", { choices: ["debug", "info", "warn", "error"] as const })
    .strict()
    .parse();

  if (argv["log-level"]) setLogLevel(argv["log-level"]);
  const outDir = path.resolve(argv.out);
  setLogFile(path.join(outDir, `run-${Date.now()}.log`));
  const formats = parseFormats(argv.formats);
  const speakerMap = argv["speaker-map"] ? await readSpeakerMap(argv["speaker-map"]) : {};

  const controller = new AbortController();
  process.once("SIGINT", () => controller.abort());

  const result = await withEngines({ asrEngine: argv.engine, diarize: argv.diarize }, (engines) =>
    runPipeline(
      argv.media,
      {
        diarize: argv.diarize,
        model: argv.model,
        language: argv.language,
        onChunkFailure: argv["on-chunk-failure"],
        signal: controller.signal,
      },
      engines
    )
  );

  const transcriptPath = await writeTranscriptJson(outDir, argv.media, result);
  const bundle = await exportAll(result.transcript, speakerMap, formats);
  const written = await writeExports(outDir, bundle);

  console.log("Artifacts:");
  console.log(" - transcript:", transcriptPath);
  for (const [format, file] of Object.entries(written)) {
    console.log(` - ${format}:`, file);
  }
  console.log(`Speakers detected: ${detectSpeakerCount(result.transcript)}`);
  for (const w of result.warnings) console.warn(`Warning: ${w.message}`);
  for (const f of bundle.failures) console.error(`Export failed: ${f.error.toString()}`);
  if (bundle.failures.length) process.exitCode = 2;
}

main()
  .catch((e) => {
    error("transcribe.fail", { error: errorMessage(e) });
    console.error(e instanceof Error ? e.toString() : e);
    process.exitCode = 1;
  })
  .finally(closeLogFile);
