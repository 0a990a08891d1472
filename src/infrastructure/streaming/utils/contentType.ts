import path from 'path';
import { HTTP_HEADERS } from '../constants/HttpConstants';

/**
 * Content type for a file name from a fixed extension table
 */
export function contentTypeFor(fileName: string, table: Readonly<Record<string, string>>): string {
  const ext = path.extname(fileName).toLowerCase();
  return table[ext] ?? HTTP_HEADERS.DEFAULT_CONTENT_TYPE;
}
