import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { describe, expect, it } from 'vitest';
import { BUNDLED_ANIMATIONS, IDLE_ANIMATION } from './app';

const ALL_ANIMATIONS = [...BUNDLED_ANIMATIONS, IDLE_ANIMATION];

function readBundled(path: string): Buffer {
  return readFileSync(fileURLToPath(new URL(`../public/${path}`, import.meta.url)));
}

function skipSubBlocks(data: Buffer, offset: number): number {
  let cursor = offset;
  while (data[cursor] !== 0) {
    cursor += data[cursor] + 1;
  }
  return cursor + 1;
}

function colorTableLength(flags: number): number {
  return flags & 0x80 ? 3 * (1 << ((flags & 0x07) + 1)) : 0;
}

/** Walks the GIF block stream and counts image descriptors. */
function countFrames(data: Buffer): number {
  let offset = 13 + colorTableLength(data[10]);
  let frames = 0;

  while (offset < data.length) {
    const marker = data[offset];
    if (marker === 0x3b) {
      return frames;
    }
    if (marker === 0x21) {
      offset = skipSubBlocks(data, offset + 2);
    } else if (marker === 0x2c) {
      frames += 1;
      offset += 10 + colorTableLength(data[offset + 9]);
      offset = skipSubBlocks(data, offset + 1);
    } else {
      throw new Error(`Unexpected block 0x${marker.toString(16)} at ${offset}`);
    }
  }
  throw new Error('GIF has no trailer');
}

describe('bundled animations', () => {
  it.each(ALL_ANIMATIONS)('%s is an animated GIF', (path) => {
    const data = readBundled(path);

    expect(data.subarray(0, 6).toString('ascii')).toBe('GIF89a');
    expect(data.readUInt16LE(6)).toBeGreaterThan(1);
    expect(data.readUInt16LE(8)).toBeGreaterThan(1);
    expect(countFrames(data)).toBeGreaterThan(1);
  });

  it('are all different', () => {
    const contents = new Set(ALL_ANIMATIONS.map((path) => readBundled(path).toString('base64')));
    expect(contents.size).toBe(4);
  });
});
