export * from './lib/cache';
