/**
 * Use case for listing cached sessions
 */

import { SessionCache } from '../services/session/SessionCache';
import { ByteFormatter } from '../../infrastructure/streaming/utils/ByteFormatter';

export interface SessionSummary {
    infoHash: string;
    name: string;
    fileCount: number;
    totalSize: number;
    totalSizeHuman: string;
    lastAccessed: string;
    idleMs: number;
}

export interface ListSessionsResponse {
    success: boolean;
    sessions: SessionSummary[];
    count: number;
}

export class ListSessionsUseCase {
    constructor(
        private sessionCache: SessionCache
    ) { }

    execute(now: number = Date.now()): ListSessionsResponse {
        const sessions = this.sessionCache.list().map((entry) => ({
            infoHash: entry.session.key,
            name: entry.session.displayName,
            fileCount: entry.session.files.length,
            totalSize: entry.session.totalSize,
            totalSizeHuman: ByteFormatter.toHumanReadable(entry.session.totalSize),
            lastAccessed: new Date(entry.lastAccessed).toISOString(),
            idleMs: entry.idleFor(now)
        }));

        return {
            success: true,
            sessions,
            count: sessions.length
        };
    }
}
