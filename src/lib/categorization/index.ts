export * from './category.rules';
export * from './categorizer';
