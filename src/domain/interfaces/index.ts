/**
 * Domain interfaces (ports) - exports all interfaces
 */

export * from './IContentEngine';
export * from './IMetadataStore';
export * from './IStreamService';
export * from './IFileSelector';
export * from './ISubtitleExtractor';
export * from './ISessionEvictionHook';
export * from './ITorrentFileFetcher';
export * from './ILogger';
