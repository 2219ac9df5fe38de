export * from './game/hex';
export { BinaryReader, BinaryReadError } from './resources/file/binary-reader';
export { BinaryWriter } from './resources/file/binary-writer';
export { LogHandler } from './utilities/log-handler';
export { LogManager, LogType } from './utilities/log-manager';
export type { ILogMessage, LogMessageCallback } from './utilities/log-manager';
