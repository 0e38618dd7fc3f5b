export * from './lib/const';
