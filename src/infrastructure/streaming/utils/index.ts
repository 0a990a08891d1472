export { ByteFormatter } from './ByteFormatter';
export { StreamErrorHandler } from './StreamErrorHandler';
export { RangeResponseBuilder } from './RangeResponseBuilder';
export type { FileHeaders } from './RangeResponseBuilder';
export { RangeParser } from './RangeParser';
export { RangeNormalizer } from './RangeNormalizer';
export { contentTypeFor } from './contentType';
export { ChunkedCopier } from './ChunkedCopier';
export type { CopyOutcome } from './ChunkedCopier';
