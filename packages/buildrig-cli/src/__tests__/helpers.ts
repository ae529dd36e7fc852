/**
 * In-process stand-ins shared by the CLI tests.
 */

import { vi } from 'vitest';
import type { Logger, ProcessResult, ProcessRunner } from '@buildrig/core';

export function createMockLogger(): Logger {
  const logger = {
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    child: vi.fn(),
  };
  logger.child.mockReturnValue(logger);
  return logger as unknown as Logger;
}

export interface RecordedCall {
  command: string;
  args: string[];
}

export type Responder = (command: string, args: string[]) => ProcessResult | Promise<ProcessResult>;

export interface FakeRunner extends ProcessRunner {
  calls: RecordedCall[];
}

/** A ProcessRunner that records every call and answers through `respond` */
export function createFakeRunner(respond: Responder): FakeRunner {
  const calls: RecordedCall[] = [];
  return {
    calls,
    async run(command: string, args: string[]): Promise<ProcessResult> {
      calls.push({ command, args: [...args] });
      return respond(command, args);
    },
  };
}

export function ok(...lines: string[]): ProcessResult {
  return { exitCode: 0, lines };
}

export function failed(exitCode: number, ...lines: string[]): ProcessResult {
  return { exitCode, lines };
}

/** Smallest buffer that passes the MZ and PE signature checks */
export function buildExecutable(characteristics: number): Buffer {
  const peOffset = 0x40;
  const data = Buffer.alloc(peOffset + 4 + 20);
  data.write('MZ', 0, 'latin1');
  data.writeUInt32LE(peOffset, 0x3c);
  data.write('PE\0\0', peOffset, 'latin1');
  data.writeUInt16LE(characteristics, peOffset + 4 + 18);
  return data;
}

export function readCharacteristics(data: Buffer): number {
  return data.readUInt16LE(0x40 + 4 + 18);
}
