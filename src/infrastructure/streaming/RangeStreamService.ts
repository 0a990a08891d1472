import { Request, Response } from 'express';
import { IStreamService } from '../../domain/interfaces/IStreamService';
import { ILogger } from '../../domain/interfaces/ILogger';
import { SessionFileEntity } from '../../domain/entities';
import { ByteRange } from '../../domain/value-objects';
import {
  RangeParser,
  RangeNormalizer,
  RangeResponseBuilder,
  StreamErrorHandler,
  ChunkedCopier,
  ByteFormatter,
  contentTypeFor,
  FileHeaders
} from './utils';

export interface RangeStreamOptions {
  /** Upper bound of a single response write */
  chunkSize: number;
  contentTypes: Readonly<Record<string, string>>;
}

/**
 * IStreamService over session readers
 * 200 for whole-file requests, 206 for single ranges, 416 for anything unsatisfiable
 */
export class RangeStreamService implements IStreamService {
  constructor(
    private readonly logger: ILogger,
    private readonly options: RangeStreamOptions
  ) {}

  async stream(req: Request, res: Response, file: SessionFileEntity): Promise<void> {
    const rangeHeader = req.headers.range;
    const fileName = file.name || 'unknown';
    const fileSize = file.length;
    const headers: FileHeaders = {
      fileName,
      fileSize,
      contentType: contentTypeFor(fileName, this.options.contentTypes)
    };

    this.logger.info(`[stream] [${fileName}] Stream request: range=${rangeHeader || 'none'}, fileSize=${fileSize}`);

    let range: ByteRange | null;
    if (!rangeHeader) {
      range = ByteRange.wholeFile(fileSize);
      RangeResponseBuilder.sendFullContent(res, headers);
    } else {
      range = this.resolveRange(rangeHeader, fileSize, fileName);
      if (!range) {
        RangeResponseBuilder.sendRangeNotSatisfiable(res, fileSize);
        return;
      }
      RangeResponseBuilder.sendPartialContent(res, range, headers);
    }

    // Empty file or HEAD: headers only
    if (!range || req.method === 'HEAD') {
      res.end();
      return;
    }

    this.logger.debug(
      `[stream] [${fileName}] Sending ${range.start}-${range.end} (${ByteFormatter.toHumanReadable(range.size)})`
    );

    let reader: NodeJS.ReadableStream;
    try {
      reader = file.createReadStream({ start: range.start, end: range.end });
    } catch (error) {
      StreamErrorHandler.handle(error instanceof Error ? error : new Error(String(error)), res, this.logger, 'stream');
      return;
    }

    await new ChunkedCopier(this.logger, fileName, range, this.options.chunkSize).copy(reader, res);
  }

  private resolveRange(rangeHeader: string, fileSize: number, fileName: string): ByteRange | null {
    const parseResult = RangeParser.parse(rangeHeader);
    if (!parseResult.success) {
      this.logger.warn(`[stream] [${fileName}] ${parseResult.message}`);
      return null;
    }
    return RangeNormalizer.normalize(parseResult.value, fileSize, this.logger, fileName);
  }
}
