export * from './ValidationSuite';
