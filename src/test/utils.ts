import { Client } from "../client.ts";
import type { Logger } from "../observability.ts";
import {
  TransportInMemory,
  type TransportInMemoryOpts,
} from "../transport/in_memory.ts";

const encoder = new TextEncoder();
const decoder = new TextDecoder();

export function bytes(text: string): Uint8Array {
  return encoder.encode(text);
}

export function text(bytes: Uint8Array): string {
  return decoder.decode(bytes);
}

export function isPrefixOf(prefix: Uint8Array, bytes: Uint8Array): boolean {
  if (prefix.byteLength > bytes.byteLength) {
    return false;
  }

  for (let i = 0; i < prefix.byteLength; i++) {
    if (prefix[i] !== bytes[i]) {
      return false;
    }
  }

  return true;
}

export type LogLine = { level: keyof Logger; message: string };

/** A {@linkcode Logger} which keeps what it is told. */
export class RecordingLogger implements Logger {
  readonly lines: LogLine[] = [];

  debug(message: string) {
    this.lines.push({ level: "debug", message });
  }

  info(message: string) {
    this.lines.push({ level: "info", message });
  }

  warn(message: string) {
    this.lines.push({ level: "warn", message });
  }

  error(message: string) {
    this.lines.push({ level: "error", message });
  }

  at(level: keyof Logger): string[] {
    return this.lines.filter((line) => line.level === level).map((line) =>
      line.message
    );
  }
}

/** A clock for lease expiry which only moves when told to. */
export class FakeClock {
  constructor(private time = 0) {}

  readonly now = (): number => this.time;

  advance(ms: number) {
    this.time += ms;
  }
}

/** A client talking to an in-memory gateway. */
export function makeClient(opts: TransportInMemoryOpts = {}) {
  const transport = new TransportInMemory(opts);
  const logger = new RecordingLogger();
  const client = new Client({ transport, observability: { logger } });

  return { client, transport, logger };
}
