import fs from 'fs';
import path from 'path';
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import { ENV } from '../pipeline/env';
import { isLogLevel, levelOrder } from '../pipeline/log';
import type { LogLevel } from '../pipeline/log';

function tailFile(file: string, printLine: (line: string) => void) {
  let size = fs.statSync(file).size;
  let pending = '';
  setInterval(() => {
    let stat: fs.Stats;
    try {
      stat = fs.statSync(file);
    } catch (e) {
      console.error('Log file unavailable:', file, e);
      process.exit(1);
    }
    if (stat.size <= size) return;
    const stream = fs.createReadStream(file, { start: size, end: stat.size - 1, encoding: 'utf8' });
    stream.on('data', (chunk) => {
      const lines = (pending + String(chunk)).split(/\r?\n/);
      pending = lines.pop() ?? '';
      lines.forEach(printLine);
    });
    size = stat.size;
  }, 1500);
}

function latestRunLog(dir: string): string | undefined {
  if (!fs.existsSync(dir)) return undefined;
  const candidates = fs
    .readdirSync(dir)
    .filter((f) => /^run-\d+\.log$/.test(f))
    .sort()
    .reverse();
  return candidates.length ? path.join(dir, candidates[0]) : undefined;
}

function lineLevel(line: string): LogLevel | undefined {
  try {
    const obj: unknown = JSON.parse(line);
    if (typeof obj === 'object' && obj !== null && 'level' in obj && typeof obj.level === 'string') {
      return isLogLevel(obj.level) ? obj.level : undefined;
    }
  } catch {
    return undefined;
  }
  return undefined;
}

async function main() {
  const argv = await yargs(hideBin(process.argv))
    .option('dir', { type: 'string', describe: 'Job output directory whose latest run log to show' })
    .option('name', { type: 'string', describe: 'Job directory name under OUTPUT_ROOT, e.g. youtube_<id>' })
    .option('file', { type: 'string', describe: 'Explicit log file path' })
    .option('level', { type: 'string', default: 'debug', describe: 'Min level filter (debug|info|warn|error)' })
    .option('follow', { type: 'boolean', default: false, describe: 'Stream appended lines' })
    .check((a) => {
      if (!a.dir && !a.name && !a.file) throw new Error('Provide --dir, --name or --file');
      if (!isLogLevel(a.level)) throw new Error(`Unknown level: ${a.level}`);
      return true;
    })
    .parse();

  let file = argv.file;
  if (!file) {
    const dir = argv.dir ? path.resolve(argv.dir) : path.resolve(ENV.outputRoot, String(argv.name));
    file = latestRunLog(dir);
    if (!file) {
      console.error('No run-*.log found in', dir);
      process.exit(1);
    }
  }
  if (!fs.existsSync(file)) {
    console.error('Log file does not exist:', file);
    process.exit(1);
  }
  const min = isLogLevel(argv.level) ? levelOrder(argv.level) : 10;

  const printLine = (raw: string) => {
    const line = raw.trim();
    if (!line) return;
    const level = lineLevel(line);
    // Lines that are not log records pass through
    if (level === undefined || levelOrder(level) >= min) {
      process.stdout.write(line + '\n');
    }
  };

  fs.readFileSync(file, 'utf8').split(/\r?\n/).forEach(printLine);
  if (argv.follow) {
    tailFile(file, printLine);
  }
}

main().catch((e) => {
  console.error(e);
  process.exit(1);
});
