// src/utils/utils.ts

/**
 * Concatenates an array of Uint8Arrays into a single Uint8Array.
 * @param arrays - An array of Uint8Arrays to concatenate.
 * @returns A new Uint8Array containing all elements from the input arrays.
 */
export function concatUint8Arrays(arrays: Uint8Array[]): Uint8Array {
  const totalLength: number = arrays.reduce((sum: number, arr: Uint8Array) => sum + arr.length, 0);
  const result: Uint8Array = new Uint8Array(totalLength);
  let offset: number = 0;
  for (const arr of arrays) {
    result.set(arr, offset);
    offset += arr.length;
  }
  return result;
}

/**
 * Returns a view on a slice of the input array (shared buffer).
 */
export function sliceUint8Array(arr: Uint8Array, start: number, end?: number): Uint8Array {
  return arr.subarray(start, end);
}

export function allocUint8Array(size: number): Uint8Array {
  return new Uint8Array(size);
}

/**
 * Index of the first occurrence of `byte` at or after `from`, -1 if absent.
 */
export function indexOfByte(arr: Uint8Array, byte: number, from: number = 0): number {
  return arr.indexOf(byte, from);
}

/**
 * Printable form of a frame fragment for logs: control bytes shown as <STX>, \t, \n ...
 */
export function toPrintable(text: string): string {
  return text
    .replace(/\u0002/g, '<STX>')
    .replace(/\u0003/g, '<ETX>')
    .replace(/\t/g, '\\t')
    .replace(/\r/g, '\\r')
    .replace(/\n/g, '\\n');
}
