export * from './Session';
export * from './ExtractionJob';
