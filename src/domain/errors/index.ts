export * from './SessionErrors';
