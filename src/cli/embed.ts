import yargs from "yargs";
import { hideBin } from "yargs/helpers";
import path from "path";
import { embedSubtitles } from "../pipeline/mux";

async function main() {
  const argv = await yargs(hideBin(process.argv))
    .option("video", { type: "string", demandOption: true })
    .option("captions", { type: "string", demandOption: true, describe: "SRT file to embed" })
    .option("out", { type: "string", describe: "Output video (default: <video>_with_captions.mp4)" })
    .option("language", { type: "string" })
    .parse();

  const video = String(argv.video);
  const parsed = path.parse(video);
  const out = argv.out ?? path.join(parsed.dir, `${parsed.name}_with_captions.mp4`);
  const outPath = await embedSubtitles(video, String(argv.captions), out, {
    language: argv.language,
  });
  console.log("Video with captions:", path.resolve(outPath));
}

main().catch((e) => {
  console.error(e);
  process.exit(1);
});
