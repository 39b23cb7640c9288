#!/usr/bin/env node

import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { resolve, join } from 'node:path';
import process from 'node:process';
import { loadConfig, parseConfig } from '../src/config.js';
import { replayCapture } from '../src/replay/captureReplay.js';
import { FrameSegmenter } from '../src/protocol/segment.js';
import type { AppConfig } from '../src/types.js';

type ParsedArgs = {
  help: boolean;
  file?: string;
  config?: string;
  chunkSize?: number;
  out?: string;
  encode?: string;
  frameBytes?: number;
};

const USAGE = `
Link capture replay

Usage:
  npx tsx scripts/replay-capture.ts --file <capture> [options]
  npx tsx scripts/replay-capture.ts --encode <audio> --out <capture> [options]

Options:
  --file <path>          Raw link byte capture to decode
  --chunk-size <n>       Bytes per simulated transport read (default: link.mtu)
  --out <path>           Decode: directory for frame-<id>.bin files. Encode: capture file to write
  --encode <path>        Build a capture from a file of frame bytes instead of decoding
  --frame-bytes <n>      Encode: bytes per frame (default: 2048)
  --config <path>        config.json to read (default: ./config.json, defaults when absent)
  --help                 Show this message
`;

const DEFAULT_FRAME_BYTES = 2048;

function parsePositiveInt(flag: string, value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new Error(`${flag} must be a positive integer, got ${value}`);
  }
  return parsed;
}

function parseArgs(argv: string[]): ParsedArgs {
  const result: ParsedArgs = { help: false };

  for (let index = 0; index < argv.length; index += 1) {
    const raw = argv[index];
    if (!raw.startsWith('--')) {
      continue;
    }
    const eq = raw.indexOf('=');
    const flag = eq === -1 ? raw : raw.slice(0, eq);
    const inlineValue = eq === -1 ? undefined : raw.slice(eq + 1);
    const name = flag.replace(/^--/, '');

    const getValue = () => {
      if (inlineValue !== undefined) {
        return inlineValue;
      }
      const next = argv[index + 1];
      if (next === undefined || next.startsWith('--')) {
        throw new Error(`${flag} requires a value`);
      }
      index += 1;
      return next;
    };

    switch (name) {
      case 'help':
        result.help = true;
        break;
      case 'file':
        result.file = getValue();
        break;
      case 'config':
        result.config = getValue();
        break;
      case 'chunk-size':
        result.chunkSize = parsePositiveInt(flag, getValue());
        break;
      case 'out':
        result.out = getValue();
        break;
      case 'encode':
        result.encode = getValue();
        break;
      case 'frame-bytes':
        result.frameBytes = parsePositiveInt(flag, getValue());
        break;
      default:
        console.warn(`Unknown option: ${flag}`);
        break;
    }
  }

  return result;
}

async function resolveConfig(configPath?: string): Promise<AppConfig> {
  const resolved = resolve(process.cwd(), configPath ?? 'config.json');
  if (!existsSync(resolved)) {
    if (configPath) {
      throw new Error(`Config file not found: ${configPath}`);
    }
    return parseConfig({});
  }
  return loadConfig(resolved);
}

async function decode(args: ParsedArgs, config: AppConfig, file: string) {
  const capture = await readFile(resolve(process.cwd(), file));
  const result = replayCapture(capture, {
    chunkSize: args.chunkSize ?? config.link.mtu,
    mtu: config.link.mtu,
    maxPendingFrames: config.reassembly.maxPendingFrames,
    frameTimeoutMs: config.reassembly.frameTimeoutMs,
  });

  if (args.out) {
    const outDir = resolve(process.cwd(), args.out);
    await mkdir(outDir, { recursive: true });
    for (const frame of result.frames) {
      await writeFile(join(outDir, `frame-${frame.frameId}.bin`), frame.payload);
    }
  }

  console.log(
    JSON.stringify(
      {
        frames: result.frames.map((frame) => ({ frameId: frame.frameId, bytes: frame.payload.length })),
        errors: result.errors,
        stats: result.stats,
      },
      null,
      2
    )
  );
}

async function encode(args: ParsedArgs, config: AppConfig, source: string) {
  if (!args.out) {
    throw new Error('--out is required with --encode');
  }
  const audio = await readFile(resolve(process.cwd(), source));
  const frameBytes = args.frameBytes ?? DEFAULT_FRAME_BYTES;
  const segmenter = new FrameSegmenter(config.link.mtu);
  const parts: Buffer[] = [];
  let frames = 0;
  for (let offset = 0; offset < audio.length; offset += frameBytes) {
    parts.push(...segmenter.segment(audio.subarray(offset, offset + frameBytes)).messages);
    frames += 1;
  }
  const capture = Buffer.concat(parts);
  await writeFile(resolve(process.cwd(), args.out), capture);
  console.log(JSON.stringify({ frames, messages: parts.length, bytes: capture.length }, null, 2));
}

async function main() {
  const args = parseArgs(process.argv.slice(2));
  if (args.help) {
    console.log(USAGE);
    return;
  }
  const config = await resolveConfig(args.config);
  if (args.encode) {
    await encode(args, config, args.encode);
    return;
  }
  if (!args.file) {
    throw new Error('--file is required (see --help)');
  }
  await decode(args, config, args.file);
}

main().catch((error) => {
  console.error(error instanceof Error ? error.message : error);
  process.exit(1);
});
