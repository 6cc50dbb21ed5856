export * from './PremiumEstimator';
