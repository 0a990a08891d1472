/**
 * Tests for RangeStreamService over an in-process express app
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import express, { Express } from 'express';
import request from 'supertest';
import { RangeStreamService } from './RangeStreamService';
import { ILogger } from '../../domain/interfaces/ILogger';
import { SessionFileEntity, toFileEntity } from '../../domain/entities';
import { createFakeSession } from '../../__mocks__/contentEngine';

const CONTENT_TYPES = { '.mp4': 'video/mp4', '.mkv': 'video/x-matroska' };

function expectedBytes(start: number, end: number): Buffer {
  const data = Buffer.alloc(end - start + 1);
  for (let i = 0; i < data.length; i++) {
    data[i] = (start + i) % 256;
  }
  return data;
}

describe('RangeStreamService', () => {
  let mockLogger: ILogger;
  let file: SessionFileEntity;
  let app: Express;

  function appFor(target: SessionFileEntity, chunkSize = 512 * 1024): Express {
    const service = new RangeStreamService(mockLogger, { chunkSize, contentTypes: CONTENT_TYPES });
    const server = express();
    server.get('/file', (req, res, next) => {
      service.stream(req, res, target).catch(next);
    });
    return server;
  }

  beforeEach(() => {
    mockLogger = {
      info: vi.fn(),
      error: vi.fn(),
      warn: vi.fn(),
      debug: vi.fn(),
      log: vi.fn()
    };
    const session = createFakeSession('ab'.repeat(20), [{ path: 'Movie/movie.mp4', size: 1000 }]);
    file = toFileEntity(session, session.files[0]);
    app = appFor(file);
  });

  it('should answer 200 with the whole file without a Range header', async () => {
    const response = await request(app).get('/file');

    expect(response.status).toBe(200);
    expect(response.headers['content-length']).toBe('1000');
    expect(response.headers['accept-ranges']).toBe('bytes');
    expect(response.body).toEqual(expectedBytes(0, 999));
  });

  it('should answer 206 for bytes=100-199', async () => {
    const response = await request(app).get('/file').set('Range', 'bytes=100-199');

    expect(response.status).toBe(206);
    expect(response.headers['content-range']).toBe('bytes 100-199/1000');
    expect(response.headers['content-length']).toBe('100');
    expect(response.body).toEqual(expectedBytes(100, 199));
  });

  it('should clamp an end past the file', async () => {
    const response = await request(app).get('/file').set('Range', 'bytes=900-5000');

    expect(response.status).toBe(206);
    expect(response.headers['content-range']).toBe('bytes 900-999/1000');
    expect(response.body).toEqual(expectedBytes(900, 999));
  });

  it('should serve an open-ended range to the end', async () => {
    const response = await request(app).get('/file').set('Range', 'bytes=990-');

    expect(response.status).toBe(206);
    expect(response.headers['content-range']).toBe('bytes 990-999/1000');
    expect(response.headers['content-length']).toBe('10');
  });

  it('should serve a suffix range', async () => {
    const response = await request(app).get('/file').set('Range', 'bytes=-5');

    expect(response.status).toBe(206);
    expect(response.headers['content-range']).toBe('bytes 995-999/1000');
  });

  it('should answer 416 when the start is past the end of the file', async () => {
    const response = await request(app).get('/file').set('Range', 'bytes=1000-');

    expect(response.status).toBe(416);
    expect(response.headers['content-range']).toBe('bytes */1000');
  });

  it('should answer 416 for multiple ranges', async () => {
    const response = await request(app).get('/file').set('Range', 'bytes=0-1,5-6');

    expect(response.status).toBe(416);
    expect(response.headers['content-range']).toBe('bytes */1000');
  });

  it('should send the file description headers', async () => {
    const response = await request(app).get('/file').set('Range', 'bytes=0-0');

    expect(response.headers['content-type']).toBe('video/mp4');
    expect(response.headers['content-disposition']).toBe('inline; filename="movie.mp4"');
    expect(response.headers['x-filename']).toBe('movie.mp4');
    expect(response.headers['x-filesize']).toBe('1000');
    expect(response.headers['x-content-type']).toBe('video/mp4');
  });

  it('should split large reads into bounded writes', async () => {
    const response = await request(appFor(file, 64)).get('/file').set('Range', 'bytes=0-299');

    expect(response.status).toBe(206);
    expect(response.body).toEqual(expectedBytes(0, 299));
  });
});
