/**
 * Use case for locating derived files (converted subtitles, extracted tracks, logs)
 */

import fs from 'fs';
import { ILogger } from '../../domain/interfaces';
import { InvalidInputError, NotFoundError } from '../../domain/errors';
import { ArtifactRegistry } from '../services/subtitles/ArtifactRegistry';
import { logUnexpected, toFailure, UseCaseFailure } from './UseCaseFailure';

export interface GetArtifactRequest {
    /** Registered name, as returned by a conversion */
    key?: string;
    /** Any file name inside the artifacts directory */
    file?: string;
}

export type GetArtifactResponse = { success: true; filePath: string } | UseCaseFailure;

export class GetArtifactUseCase {
    constructor(
        private artifacts: ArtifactRegistry,
        private logger: ILogger
    ) { }

    execute(request: GetArtifactRequest): GetArtifactResponse {
        try {
            const filePath = request.key !== undefined ? this.byKey(request.key) : this.byFileName(request.file);
            if (!fs.existsSync(filePath)) {
                throw new NotFoundError('File not found or no longer active');
            }
            return { success: true, filePath };
        } catch (error) {
            logUnexpected(this.logger, 'GetArtifactUseCase', error);
            return toFailure(error);
        }
    }

    private byKey(key: string): string {
        if (!key) {
            throw new InvalidInputError("Missing 'key' query parameter");
        }
        const filePath = this.artifacts.lookup(key);
        if (!filePath) {
            throw new NotFoundError('VTT file not found or no longer active');
        }
        return filePath;
    }

    private byFileName(file: string | undefined): string {
        if (!file) {
            throw new InvalidInputError("Missing 'file' query parameter");
        }
        const filePath = this.artifacts.resolveInside(file);
        if (!filePath) {
            throw new InvalidInputError('Invalid file path');
        }
        return filePath;
    }
}
