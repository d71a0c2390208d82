export * from './graph';
export * from './degree';
export * from './euler';
export * from './assemble';
export * from './kmer';
export * from './io';
export * from './errors';
export * from './config';
export * from './log';
