export * from './core/errors';
export * from './core/propagation';
export { NumberFormatError, parseInteger } from './core/parsing/parseInteger';
export { Logger, LogLevel } from './core/logging/Logger';
export { report, runMain, TextSink } from './interface/cli/report';
