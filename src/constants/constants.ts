// src/constants/constants.ts

/**
 * Wire grammar of a Teleinfo frame
 */
export enum TeleinfoMode {
  Legacy = 'legacy',
  Standard = 'standard',
}

/**
 * Frame delimiters of the Teleinfo link layer
 */
export const CONTROL_BYTES = {
  STX: 0x02,
  ETX: 0x03,
} as const; // as const: readonly literal types for keys/values

export const LINE_START = '\n';
export const LINE_END = '\r';

/**
 * Field separator per mode
 */
export const SEPARATORS: Readonly<Record<TeleinfoMode, string>> = {
  [TeleinfoMode.Legacy]: ' ',
  [TeleinfoMode.Standard]: '\t',
};

export const CHECKSUM_MASK = 0x3f;
export const CHECKSUM_OFFSET = 0x20;

/** Season marker + YYMMDDHHMMSS */
export const HORODATE_LENGTH = 13;
export const HORODATE_DIGITS = 12;
export const HORODATE_CENTURY = 2000;

/**
 * Serial line settings per mode (7 data bits, even parity, 1 stop bit)
 */
export const SERIAL_DEFAULTS: Readonly<
  Record<TeleinfoMode, { baudRate: number; dataBits: 7; parity: 'even'; stopBits: 1 }>
> = {
  [TeleinfoMode.Legacy]: { baudRate: 1200, dataBits: 7, parity: 'even', stopBits: 1 },
  [TeleinfoMode.Standard]: { baudRate: 9600, dataBits: 7, parity: 'even', stopBits: 1 },
};

export const DECODE_DEFAULTS = {
  READ_CHUNK_SIZE: 200,
  READ_TIMEOUT: 1000,
  MAX_BUFFER_SIZE: 64 * 1024,
} as const;
