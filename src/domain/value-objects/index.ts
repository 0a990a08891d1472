export * from './ByteRange';
export * from './ParsedRange';
export * from './MagnetDescriptor';
