export type { ILogProvider, LogEvent, LogLevel, TrafficLogEvent } from './ILogProvider.js';
export { ConsoleLogProvider } from './ConsoleLogProvider.js';
export { PinoLogProvider, createPinoLogger } from './PinoLogProvider.js';
export type { PinoLogProviderOptions } from './PinoLogProvider.js';
