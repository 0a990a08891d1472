import { Response } from 'express';
import { ByteRange } from '../../../domain/value-objects/ByteRange';
import { HTTP_STATUS, HTTP_HEADERS } from '../constants/HttpConstants';

/**
 * Headers describing the file, sent with every 200/206 response
 */
export interface FileHeaders {
  fileName: string;
  fileSize: number;
  contentType: string;
}

/**
 * Builds and sends HTTP range responses
 */
export class RangeResponseBuilder {
  /**
   * Sends 200 OK headers for the whole file
   */
  static sendFullContent(res: Response, file: FileHeaders): void {
    res.writeHead(HTTP_STATUS.OK, {
      ...this.fileHeaders(file),
      'Content-Length': file.fileSize
    });
  }

  /**
   * Sends 206 Partial Content headers
   */
  static sendPartialContent(res: Response, range: ByteRange, file: FileHeaders): void {
    res.writeHead(HTTP_STATUS.PARTIAL_CONTENT, {
      ...this.fileHeaders(file),
      'Content-Range': range.toContentRange(file.fileSize),
      'Content-Length': range.size
    });
  }

  /**
   * Sends 416 Range Not Satisfiable response
   */
  static sendRangeNotSatisfiable(res: Response, fileSize: number): void {
    res.writeHead(HTTP_STATUS.RANGE_NOT_SATISFIABLE, {
      'Content-Range': `bytes */${fileSize}`,
      'Accept-Ranges': HTTP_HEADERS.ACCEPT_RANGES
    });
    res.end();
  }

  private static fileHeaders(file: FileHeaders): Record<string, string | number> {
    return {
      'Content-Type': file.contentType,
      'Accept-Ranges': HTTP_HEADERS.ACCEPT_RANGES,
      'Content-Disposition': `inline; filename="${encodeURIComponent(file.fileName)}"`,
      'Cache-Control': HTTP_HEADERS.CACHE_CONTROL_NO_CACHE,
      'X-Filename': encodeURIComponent(file.fileName),
      'X-Filesize': String(file.fileSize),
      'X-Content-Type': file.contentType
    };
  }
}
