/**
 * Domain interfaces (ports) - exports all interfaces
 */

export * from './ILogger';
export * from './IHttpClient';
export * from './IDecompressor';
export * from './IProgressReporter';
