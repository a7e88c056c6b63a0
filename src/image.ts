import { readFileSync } from 'fs';
import { MEMORY_MAX } from './constants/memory';
import { ImageFormatError } from './errors';
import { Memory } from './hardware/memory';

/**
 * Loads a program image: a big-endian origin word followed by big-endian
 * words placed from the origin upward. A trailing odd byte is ignored.
 * Returns the origin.
 */
export function readImage(memory: Memory, image: Uint8Array): number {
  if (image.length < 2) {
    throw new ImageFormatError(
      `image is ${image.length} byte(s), too short for an origin word`
    );
  }
  const view = Buffer.from(image.buffer, image.byteOffset, image.length);
  /* the origin tells us where in memory to place the image */
  const origin = view.readUInt16BE(0);
  const count = Math.floor(view.length / 2) - 1;

  if (origin + count > MEMORY_MAX) {
    throw new ImageFormatError(
      `${count} words at origin 0x${origin.toString(16)} run past the end of memory`
    );
  }

  const words = new Uint16Array(count);
  for (let pos = 0; pos < count; pos++) {
    words[pos] = view.readUInt16BE((pos + 1) * 2);
  }
  memory.load(origin, words);
  return origin;
}

export function readImageFile(memory: Memory, imagePath: string): number {
  return readImage(memory, readFileSync(imagePath));
}
