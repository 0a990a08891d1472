/**
 * Interface for picking the file of a session to work on
 */

import { FileDescriptor, Session } from '../entities/Session';

export interface IFileSelector {
  /**
   * Picks a file by index, or the default file when the index is absent or out of range
   * @returns the file, or null when the session has no files
   */
  select(session: Session, index?: number): FileDescriptor | null;
}
