import yargs from "yargs";
import { hideBin } from "yargs/helpers";
import path from "path";
import { parseCaptionFormat } from "../pipeline/config";
import { processVideo } from "../pipeline/run";

async function main() {
  const argv = await yargs(hideBin(process.argv))
    .usage("Usage: $0 <youtube-url | video-file> [options]")
    .option("output-dir", { alias: "o", type: "string", describe: "Directory for every output file (default: derived from the input under OUTPUT_ROOT)" })
    .option("format", { alias: "f", type: "string", default: "srt", describe: "Caption format: srt or vtt" })
    .option("chunk-size", { alias: "c", type: "number", describe: "Window length in seconds" })
    .option("concurrency", { type: "number", describe: "Windows transcribed in parallel" })
    .option("skip-captions", { type: "boolean", default: false, describe: "Reuse an existing captions file" })
    .option("skip-embedding", { type: "boolean", default: false, describe: "Only write the caption file" })
    .option("optimize", { type: "boolean", describe: "Global timing pass (--no-optimize to disable)" })
    .option("classify-gaps", { type: "boolean", describe: "Ask the service to describe gaps (--no-classify-gaps to disable)" })
    .option("language", { type: "string", describe: "Subtitle stream language tag, e.g. eng" })
    .demandCommand(1, "Provide a YouTube URL or a video file path")
    .help()
    .parse();

  const input = String(argv._[0]);
  const controller = new AbortController();
  process.once("SIGINT", () => {
    console.error("\nCancelling...");
    controller.abort();
  });

  const result = await processVideo(input, {
    outputDir: argv["output-dir"],
    skipCaptions: argv["skip-captions"],
    skipEmbedding: argv["skip-embedding"],
    signal: controller.signal,
    config: {
      format: parseCaptionFormat(argv.format),
      chunkSec: argv["chunk-size"],
      concurrency: argv.concurrency,
      optimizeTiming: argv.optimize,
      classifyGaps: argv["classify-gaps"],
      subtitleLanguage: argv.language,
    },
  });

  console.log("\nProcess completed successfully!");
  console.log("Generated files:");
  for (const [kind, file] of Object.entries(result)) {
    if (file) console.log(` - ${kind}:`, path.resolve(file));
  }
}

main().catch((e) => {
  console.error(e);
  process.exit(1);
});
