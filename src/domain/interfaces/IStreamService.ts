/**
 * Stream service interface
 * Delivers one session file over HTTP with range request support
 */

import { Request, Response } from 'express';
import { SessionFileEntity } from '../entities/Session';

export interface IStreamService {
  /**
   * Streams a file, answering 200 for whole-file requests and 206 for ranges
   * @returns Promise that settles once the response is finished or abandoned
   */
  stream(req: Request, res: Response, file: SessionFileEntity): Promise<void>;
}
