import fs from "fs-extra";
import path from "path";
import { z } from "zod";
import { AcquisitionError, FormatError } from "./errors";
import { parseKind, sortByStart } from "./segment";
import type { CaptionFormat, Segment, Transcript, TranscriptJson } from "./types";
import { info } from "./log";

/**
 * HH:MM:SS<sep>mmm. Milliseconds are rounded then capped at 999 without
 * carrying into the next second, so 59.9996 renders as 00:00:59,999.
 */
export function formatTimestamp(seconds: number, sep: "," | "."): string {
  const s = Number.isFinite(seconds) ? Math.max(0, seconds) : 0;
  const hours = Math.floor(s / 3600);
  const remainder = s % 3600;
  const minutes = Math.floor(remainder / 60);
  const secs = remainder % 60;
  const ms = Math.min(999, Math.round((secs % 1) * 1000));
  const pad = (n: number, w = 2) => String(n).padStart(w, "0");
  return `${pad(hours)}:${pad(minutes)}:${pad(Math.floor(secs))}${sep}${pad(ms, 3)}`;
}

export function formatSrtTimestamp(seconds: number): string {
  return formatTimestamp(seconds, ",");
}

export function formatVttTimestamp(seconds: number): string {
  return formatTimestamp(seconds, ".");
}

// Blank lines end a cue and "-->" starts a timing line; neither may appear in cue text
function cleanText(text: string): string {
  const body = text
    .replace(/\r\n?/g, "\n")
    .split("\n")
    .map((l) => l.trim())
    .filter(Boolean)
    .join("\n")
    .replace(/-->/g, "->");
  return body || "[unintelligible]";
}

function escapeVtt(text: string): string {
  return text.replace(/&/g, "&amp;").replace(/</g, "&lt;").replace(/>/g, "&gt;");
}

export function decorateSrt(segment: Segment): string {
  const text = cleanText(segment.text);
  if (segment.kind === "music" && !text.startsWith("[♪")) return `[♪ ${text} ♪]`;
  if (segment.kind === "sound" && !text.startsWith("[Sound:")) return `[Sound: ${text}]`;
  if (segment.kind === "silence" && !text.startsWith("[")) return `[${text}]`;
  return text;
}

export function decorateVtt(segment: Segment): string {
  const text = escapeVtt(cleanText(segment.text));
  if (segment.kind === "music" && !text.startsWith("[♪")) return `<i>[♪ ${text} ♪]</i>`;
  if (segment.kind === "sound" && !text.startsWith("[Sound:")) return `<b>[Sound: ${text}]</b>`;
  if (segment.kind === "silence" && !text.startsWith("[")) return `[${text}]`;
  return text;
}

export function formatSrt(transcript: Transcript): string {
  const lines: string[] = [];
  sortByStart(transcript).forEach((seg, i) => {
    lines.push(String(i + 1));
    lines.push(`${formatSrtTimestamp(seg.startSec)} --> ${formatSrtTimestamp(seg.endSec)}`);
    lines.push(decorateSrt(seg));
    lines.push("");
  });
  return lines.join("\n");
}

export function formatVtt(transcript: Transcript): string {
  const lines: string[] = ["WEBVTT", ""];
  sortByStart(transcript).forEach((seg, i) => {
    lines.push(`cue-${i + 1}`);
    lines.push(`${formatVttTimestamp(seg.startSec)} --> ${formatVttTimestamp(seg.endSec)}`);
    lines.push(decorateVtt(seg));
    lines.push("");
  });
  return lines.join("\n");
}

export function formatCaptions(transcript: Transcript, format: CaptionFormat): string {
  switch (format) {
    case "srt":
      return formatSrt(transcript);
    case "vtt":
      return formatVtt(transcript);
    default:
      throw new FormatError(`Unsupported caption format: ${String(format)}`);
  }
}

export async function writeCaptions(
  transcript: Transcript,
  outDir: string,
  format: CaptionFormat
): Promise<string> {
  const outPath = path.join(outDir, `captions.${format}`);
  await fs.ensureDir(outDir);
  await fs.writeFile(outPath, formatCaptions(transcript, format), "utf8");
  info("export.write", { path: outPath, format, segments: transcript.length });
  return outPath;
}

const TranscriptFileSchema = z.object({
  source: z.object({
    input: z.string(),
    kind: z.enum(["youtube", "local"]),
    videoId: z.string().optional(),
    durationSec: z.number().optional(),
  }),
  processing: z.object({
    createdAt: z.string(),
    model: z.string(),
    chunkSec: z.number(),
    optimized: z.boolean(),
  }),
  durationSec: z.number(),
  segments: z.array(
    z.object({
      text: z.string().min(1),
      startSec: z.number(),
      endSec: z.number(),
      kind: z.string().transform(parseKind),
    })
  ),
});

export async function writeTranscriptJson(t: TranscriptJson, outDir: string): Promise<string> {
  const outPath = path.join(outDir, "transcript.json");
  await fs.ensureDir(outDir);
  await fs.writeJson(outPath, t, { spaces: 2 });
  return outPath;
}

export async function readTranscriptJson(transcriptPath: string): Promise<TranscriptJson> {
  if (!(await fs.pathExists(transcriptPath))) {
    throw new AcquisitionError(`Transcript not found: ${transcriptPath}`);
  }
  const parsed = TranscriptFileSchema.safeParse(await fs.readJson(transcriptPath));
  if (!parsed.success) {
    throw new AcquisitionError(`Transcript file is malformed: ${transcriptPath}`, {
      issues: parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`),
    });
  }
  return parsed.data;
}
