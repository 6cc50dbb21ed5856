export * from './TwapPlanner';
