import { Response } from 'express';
import { ILogger } from '../../../domain/interfaces/ILogger';
import { ByteRange } from '../../../domain/value-objects/ByteRange';

export type CopyOutcome = 'completed' | 'client-closed' | 'source-failed';

type DestroyableStream = NodeJS.ReadableStream & { destroy(error?: Error): void };

function isDestroyable(stream: NodeJS.ReadableStream): stream is DestroyableStream {
  return 'destroy' in stream && typeof stream.destroy === 'function';
}

/**
 * Copies a reader into a response in bounded chunks, awaiting drain on backpressure
 */
export class ChunkedCopier {
  private bytesSent = 0;
  private clientClosed = false;

  constructor(
    private readonly logger: ILogger,
    private readonly fileName: string,
    private readonly range: ByteRange,
    private readonly chunkSize: number
  ) {}

  async copy(source: NodeJS.ReadableStream, res: Response): Promise<CopyOutcome> {
    const onClose = (): void => {
      if (!res.writableFinished) {
        this.clientClosed = true;
        if (isDestroyable(source)) {
          source.destroy();
        }
      }
    };
    res.once('close', onClose);

    try {
      for await (const raw of source) {
        const chunk = Buffer.isBuffer(raw) ? raw : Buffer.from(raw);
        for (let offset = 0; offset < chunk.length; offset += this.chunkSize) {
          if (this.clientClosed || res.destroyed) {
            return this.closedByClient();
          }
          const piece = chunk.subarray(offset, offset + this.chunkSize);
          this.bytesSent += piece.length;
          if (!res.write(piece)) {
            await this.drainOrClose(res);
          }
        }
      }
    } catch (error) {
      if (this.clientClosed || res.destroyed) {
        return this.closedByClient();
      }
      this.logger.error(
        `[stream] [${this.fileName}] Reader error (bytes ${this.range.start}-${this.range.end}), ` +
          `sent ${this.bytesSent}/${this.range.size} bytes:`,
        error
      );
      res.end();
      return 'source-failed';
    } finally {
      res.off('close', onClose);
    }

    if (this.clientClosed || res.destroyed) {
      return this.closedByClient();
    }
    if (this.bytesSent !== this.range.size) {
      this.logger.warn(
        `[stream] [${this.fileName}] Sent ${this.bytesSent} bytes but expected ${this.range.size} bytes`
      );
    }
    res.end();
    return 'completed';
  }

  private closedByClient(): CopyOutcome {
    this.logger.debug(
      `[stream] [${this.fileName}] Client disconnected after ${this.bytesSent}/${this.range.size} bytes`
    );
    return 'client-closed';
  }

  private drainOrClose(res: Response): Promise<void> {
    return new Promise<void>((resolve) => {
      const done = (): void => {
        res.off('drain', done);
        res.off('close', done);
        resolve();
      };
      res.once('drain', done);
      res.once('close', done);
    });
  }
}
