export * from './generate-recommendations.processor';
