import { createHash } from 'crypto';
import { SessionKey } from '../../../domain/entities';

/**
 * Converted subtitle name: <key>_<sha256(key + sourcePath)>.vtt
 */
export function vttArtifactName(key: SessionKey, sourcePath: string): string {
  const digest = createHash('sha256').update(key + sourcePath).digest('hex');
  return `${key}_${digest}.vtt`;
}

export interface ExtractionArtifactNames {
  subtitleFile: string;
  logFile: string;
}

export function extractionArtifactNames(key: SessionKey, fileIndex: number): ExtractionArtifactNames {
  return {
    subtitleFile: `${key}_${fileIndex}.ass`,
    logFile: `${key}_${fileIndex}.log`
  };
}

/**
 * Every artifact of a session starts with this prefix
 */
export function artifactPrefix(key: SessionKey): string {
  return `${key}_`;
}
