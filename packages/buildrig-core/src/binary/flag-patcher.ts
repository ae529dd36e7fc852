/**
 * Sets one bit in the header of a PE executable, by fixed byte offsets only.
 *
 * The default layout toggles IMAGE_FILE_LARGE_ADDRESS_AWARE, which lets a
 * 32-bit Windows executable address more than 2 GB.
 */

import * as fs from 'node:fs';
import { BinaryFormatError } from '../errors.js';

export interface HeaderFlagLayout {
  /** Magic at offset 0 */
  signature: Buffer;
  /** Offset of the u32 LE pointer to the secondary header */
  headerPointerOffset: number;
  /** Magic at the start of the secondary header */
  headerSignature: Buffer;
  /** Offset of the u16 LE characteristics field from the secondary header */
  characteristicsOffset: number;
  flag: number;
}

export const LARGE_ADDRESS_AWARE_LAYOUT: HeaderFlagLayout = {
  signature: Buffer.from('MZ', 'latin1'),
  headerPointerOffset: 0x3c,
  headerSignature: Buffer.from('PE\0\0', 'latin1'),
  // 4-byte signature, then Characteristics at offset 18 of the COFF header
  characteristicsOffset: 4 + 18,
  flag: 0x0020,
};

/** Both outcomes are successes; only 'set' means bytes changed */
export type FlagPatchOutcome = 'already-set' | 'set';

/** Minimal positional reader over a buffer or an open file */
type ReadAt = (position: number, length: number) => Buffer;

function locateCharacteristics(read: ReadAt, label: string, layout: HeaderFlagLayout): number {
  if (!read(0, layout.signature.length).equals(layout.signature)) {
    throw new BinaryFormatError(label, `No ${layout.signature.toString('latin1')} signature`);
  }

  const pointer = read(layout.headerPointerOffset, 4);
  if (pointer.length < 4) {
    throw new BinaryFormatError(label, 'Truncated header pointer');
  }
  const headerOffset = pointer.readUInt32LE(0);

  if (!read(headerOffset, layout.headerSignature.length).equals(layout.headerSignature)) {
    throw new BinaryFormatError(label, 'Error in PE header');
  }

  return headerOffset + layout.characteristicsOffset;
}

function readCharacteristics(read: ReadAt, offset: number, label: string): number {
  const field = read(offset, 2);
  if (field.length < 2) {
    throw new BinaryFormatError(label, 'Truncated characteristics field');
  }
  return field.readUInt16LE(0);
}

/**
 * Set the flag on an in-memory executable.
 * The input buffer is never modified; `data` is a patched copy when the
 * outcome is 'set' and the input itself otherwise.
 */
export function setHeaderFlag(
  data: Buffer,
  label: string,
  layout: HeaderFlagLayout = LARGE_ADDRESS_AWARE_LAYOUT
): { outcome: FlagPatchOutcome; data: Buffer } {
  const read: ReadAt = (position, length) => data.subarray(position, position + length);
  const offset = locateCharacteristics(read, label, layout);
  const bits = readCharacteristics(read, offset, label);

  if ((bits & layout.flag) === layout.flag) {
    return { outcome: 'already-set', data };
  }

  const patched = Buffer.from(data);
  patched.writeUInt16LE(bits | layout.flag, offset);
  return { outcome: 'set', data: patched };
}

/**
 * Set the flag in place on an executable file.
 * The file is opened read-only first and only reopened for writing when the
 * flag is not already set.
 */
export function setHeaderFlagInFile(
  filePath: string,
  layout: HeaderFlagLayout = LARGE_ADDRESS_AWARE_LAYOUT
): FlagPatchOutcome {
  const { offset, bits } = inspectFile(filePath, layout);

  if ((bits & layout.flag) === layout.flag) {
    return 'already-set';
  }

  const field = Buffer.alloc(2);
  field.writeUInt16LE(bits | layout.flag, 0);
  const fd = fs.openSync(filePath, 'r+');
  try {
    fs.writeSync(fd, field, 0, 2, offset);
  } finally {
    fs.closeSync(fd);
  }
  return 'set';
}

function inspectFile(filePath: string, layout: HeaderFlagLayout): { offset: number; bits: number } {
  const fd = fs.openSync(filePath, 'r');
  try {
    const read: ReadAt = (position, length) => {
      const chunk = Buffer.alloc(length);
      const bytesRead = fs.readSync(fd, chunk, 0, length, position);
      return chunk.subarray(0, bytesRead);
    };
    const offset = locateCharacteristics(read, filePath, layout);
    return { offset, bits: readCharacteristics(read, offset, filePath) };
  } finally {
    fs.closeSync(fd);
  }
}
