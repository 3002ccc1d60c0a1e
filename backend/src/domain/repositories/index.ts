export * from './IResultStore';
