import { IFileSelector } from '../../domain/interfaces';
import { FileDescriptor, Session } from '../../domain/entities';

/**
 * Picks the file by index; a missing or out-of-range index falls back to the largest file
 */
export class LargestFileSelector implements IFileSelector {
    select(session: Session, index?: number): FileDescriptor | null {
        if (index !== undefined && index >= 0 && index < session.files.length) {
            return session.files[index];
        }

        let largest: FileDescriptor | null = null;
        for (const file of session.files) {
            if (!largest || file.size > largest.size) {
                largest = file;
            }
        }
        return largest;
    }
}

/**
 * Parses the `index` query value. Anything that is not an integer
 * yields undefined and means "default file".
 */
export function parseFileIndex(raw: unknown): number | undefined {
    if (typeof raw !== 'string' || !/^-?\d+$/.test(raw)) {
        return undefined;
    }
    const index = Number(raw);
    return Number.isSafeInteger(index) ? index : undefined;
}
