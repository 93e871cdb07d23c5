// src/index.ts

export { TeleinfoMode, CONTROL_BYTES, SEPARATORS, HORODATE_LENGTH } from './constants/constants.js';
export { DEFAULT_TAGS, createTagDictionary } from './constants/tags.js';
export type { TagDictionary, ExtraTags } from './constants/tags.js';

export * from './errors.js';

export { checksum, checksumChar, buildChecksumInput, isFieldValid } from './utils/checksum.js';
export { parseHorodate, formatHorodate } from './parser/horodate.js';
export { tokenizeLegacyLine, tokenizeStandardLine } from './parser/field-tokenizer.js';
export type { TokenizedLine } from './parser/field-tokenizer.js';

export type { TeleinfoFramer } from './framers/teleinfo-framer.js';
export { LegacyFramer } from './framers/legacy-framer.js';
export { StandardFramer } from './framers/standard-framer.js';
export { extractFrame, decodeBody, selectMode } from './framers/frame-extractor.js';
export type { ModeSelection, SelectModeOptions } from './framers/frame-extractor.js';
export { TeleinfoProtocol, decode, decodeFrame } from './framers/teleinfo-protocol.js';
export type { DecodeResult } from './framers/teleinfo-protocol.js';

export { TeleinfoRecord, assertValid } from './record/teleinfo-record.js';
export type { TeleinfoRecordJSON } from './record/teleinfo-record.js';
export {
  TeleinfoMessageType,
  TeleinfoMeterType,
  messageType,
  meterType,
  currentIndex,
  billingIndices,
} from './record/meter-info.js';

export { TeleinfoReader } from './reader.js';
export type { RecordIterationOptions } from './reader.js';

export { createTransport } from './transport/factory.js';
export type {
  TransportType,
  NodeSerialFactoryOptions,
  NodeTcpFactoryOptions,
} from './transport/factory.js';
export { NodeSerialTransport } from './transport/node-transports/node-serialport.js';
export type { SerialPortHandle, SerialPortSettings } from './transport/node-transports/node-serialport.js';
export { NodeTcpTransport } from './transport/node-transports/node-tcp-transport.js';

export { Diagnostics } from './utils/diagnostics.js';
export { default as Logger, rootLogger } from './logger.js';

export { ConnectionErrorType } from './types/teleinfo-types.js';
export type {
  Horodate,
  HorodateSeason,
  TeleinfoField,
  ParsedFrame,
  FrameExtraction,
  TeleinfoSource,
  Transport,
  PortStateHandler,
  NodeSerialTransportOptions,
  NodeTcpTransportOptions,
  DecodeOptions,
  TeleinfoReaderOptions,
  LogLevel,
  LogContext,
  LoggerInstance,
  DiagnosticsOptions,
  DiagnosticsStats,
  AnalysisResult,
} from './types/teleinfo-types.js';
