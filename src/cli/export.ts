import yargs from "yargs";
import { hideBin } from "yargs/helpers";
import path from "path";
import { parseCaptionFormat } from "../pipeline/config";
import { readTranscriptJson, writeCaptions } from "../pipeline/export";

async function main() {
  const argv = await yargs(hideBin(process.argv))
    .option("transcript", { type: "string", demandOption: true, describe: "Path to transcript.json" })
    .option("format", { type: "string", default: "srt" })
    .option("out", { type: "string", describe: "Output directory (default: next to the transcript)" })
    .parse();

  const transcriptPath = String(argv.transcript);
  const t = await readTranscriptJson(transcriptPath);
  const outPath = await writeCaptions(
    t.segments,
    argv.out ?? path.dirname(transcriptPath),
    parseCaptionFormat(argv.format)
  );
  console.log("Captions:", path.resolve(outPath));
}

main().catch((e) => {
  console.error(e);
  process.exit(1);
});
