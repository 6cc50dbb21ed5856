export * from './CombinedStrategy';
