// src/framers/frame-extractor.ts

import { CONTROL_BYTES } from '../constants/constants.js';
import type { FrameExtraction, ParsedFrame } from '../types/teleinfo-types.js';
import { indexOfByte, sliceUint8Array } from '../utils/utils.js';
import type { TeleinfoFramer } from './teleinfo-framer.js';

const bodyDecoder = new TextDecoder('utf-8', { fatal: false, ignoreBOM: true });

/**
 * Locates the first STX..ETX frame in `buffer`.
 *
 * Bytes before the STX are noise. The body is returned as a view, `end` is the offset
 * right after the ETX.
 */
export function extractFrame(buffer: Uint8Array): FrameExtraction {
  const start = indexOfByte(buffer, CONTROL_BYTES.STX);
  if (start < 0) return { status: 'incomplete' };

  const stop = indexOfByte(buffer, CONTROL_BYTES.ETX, start + 1);
  if (stop < 0) return { status: 'incomplete' };

  return { status: 'complete', body: sliceUint8Array(buffer, start + 1, stop), end: stop + 1 };
}

/**
 * Decodes a frame body to text. Invalid UTF-8 becomes U+FFFD.
 */
export function decodeBody(body: Uint8Array): string {
  return bodyDecoder.decode(body);
}

export interface SelectModeOptions {
  acceptPartialFrames?: boolean;
}

export interface ModeSelection {
  frame: ParsedFrame;
  /** Whether the grammar consumed the whole body */
  complete: boolean;
}

/**
 * Tries each framer in order; the first one that consumes the whole body wins.
 *
 * With `acceptPartialFrames` the first framer that parsed at least one line is kept
 * when no framer consumes everything.
 * @returns null when no grammar fits
 */
export function selectMode(
  text: string,
  framers: readonly TeleinfoFramer[],
  options: SelectModeOptions = {}
): ModeSelection | null {
  let partial: ParsedFrame | null = null;

  for (const framer of framers) {
    const frame = framer.parseBody(text);
    if (!frame) continue;
    if (frame.consumed === text.length) return { frame, complete: true };
    partial ??= frame;
  }

  if (partial && options.acceptPartialFrames) {
    return { frame: partial, complete: false };
  }
  return null;
}
