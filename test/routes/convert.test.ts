import { describe, expect, it, beforeAll, afterAll } from '@jest/globals';
import { promises as fs } from 'fs';
import path from 'path';
import supertest from 'supertest';
import JSZip from 'jszip';
import { FastifyInstance } from 'fastify';
import { build } from '../../src/server';
import type { AppConfig } from '../../src/types';
import { FAKE_ENGINES, fakeTable, makeTempDir, readPidFile, waitForExit, FakeTableOptions } from '../helpers/fake-engines';

const ABSOLUTE_PATH = /(^|[^\w.])\/[\w.@+-]+\/[\w.@+-]/;

function encode(text: string): string {
  return Buffer.from(text).toString('base64');
}

/**
 * Poll until `dir` has no entries or `withinMs` elapses
 */
async function waitForEmpty(dir: string, withinMs = 2000): Promise<boolean> {
  const deadline = Date.now() + withinMs;
  for (;;) {
    if ((await fs.readdir(dir)).length === 0) return true;
    if (Date.now() > deadline) return false;
    await new Promise((resolve) => setTimeout(resolve, 50));
  }
}

describe('Conversion Endpoints', () => {
  let workdir: string;
  const apps: FastifyInstance[] = [];

  async function buildApp(tableOptions: FakeTableOptions = {}, config: Partial<AppConfig> = {}): Promise<FastifyInstance> {
    const app = await build({
      formatTable: fakeTable(tableOptions),
      config: { enabledEngines: FAKE_ENGINES, conversionWorkdir: workdir, ...config },
    });
    await app.ready();
    apps.push(app);
    return app;
  }

  beforeAll(async () => {
    workdir = await makeTempDir('routes');
  });

  afterAll(async () => {
    await Promise.all(apps.map((app) => app.close()));
    await fs.rm(workdir, { recursive: true, force: true });
  });

  describe('POST /convert', () => {
    let app: FastifyInstance;

    beforeAll(async () => {
      app = await buildApp();
    });

    it('should return the converted document with download headers', async () => {
      const response = await supertest(app.server)
        .post('/convert')
        .send({ fileName: 'Report.docx', content: encode('hello'), outputFormat: 'pdf' })
        .responseType('blob');

      expect(response.status).toBe(200);
      expect(response.headers['content-type']).toBe('application/pdf');
      expect(response.headers['content-disposition']).toBe('attachment; filename="Report.pdf"');
      expect(response.headers['x-conversion-plan']).toBe('docx>pdf');
      expect(response.headers['x-page-count']).toBeUndefined();
      expect(Buffer.from(response.body).toString()).toBe('[pdf]hello');
    });

    it('should return page images as a zip with a page count', async () => {
      const response = await supertest(app.server)
        .post('/convert')
        .send({ fileName: 'Report.docx', content: encode('hello'), outputFormat: 'png', options: { dpi: 150 } })
        .responseType('blob');

      expect(response.status).toBe(200);
      expect(response.headers['content-type']).toBe('application/zip');
      expect(response.headers['content-disposition']).toBe('attachment; filename="Report.zip"');
      expect(response.headers['x-conversion-plan']).toBe('docx>pdf>png');
      expect(response.headers['x-page-count']).toBe('2');

      const zip = await JSZip.loadAsync(Buffer.from(response.body));
      expect(Object.keys(zip.files).sort()).toEqual(['Report-1.png', 'Report-2.png']);
    });

    it('should prefer inputFormat over the file name extension', async () => {
      const response = await supertest(app.server)
        .post('/convert')
        .send({ fileName: 'upload.bin', inputFormat: 'odt', content: encode('text'), outputFormat: 'PDF' })
        .responseType('blob');

      expect(response.status).toBe(200);
      expect(response.headers['x-conversion-plan']).toBe('odt>pdf');
      expect(response.headers['content-disposition']).toBe('attachment; filename="upload.pdf"');
    });

    it('should echo the caller correlation ID', async () => {
      const response = await supertest(app.server)
        .post('/convert')
        .set('x-correlation-id', 'convert-trace-1')
        .send({ fileName: 'Report.docx', content: encode('hello'), outputFormat: 'pdf' })
        .responseType('blob');

      expect(response.status).toBe(200);
      expect(response.headers['x-correlation-id']).toBe('convert-trace-1');
    });

    it('should return identical bytes when the same document is converted twice', async () => {
      const convert = () =>
        supertest(app.server)
          .post('/convert')
          .send({ fileName: 'Report.docx', content: encode('same input'), outputFormat: 'png' })
          .responseType('blob');

      const first = await convert();
      const second = await convert();

      expect(first.status).toBe(200);
      expect(second.status).toBe(200);
      const [firstZip, secondZip] = await Promise.all([
        JSZip.loadAsync(Buffer.from(first.body)),
        JSZip.loadAsync(Buffer.from(second.body)),
      ]);
      expect(await secondZip.file('Report-1.png')?.async('string')).toBe(await firstZip.file('Report-1.png')?.async('string'));
      expect(await secondZip.file('Report-2.png')?.async('string')).toBe(await firstZip.file('Report-2.png')?.async('string'));
    });

    it('should leave no scope directories behind', async () => {
      await supertest(app.server)
        .post('/convert')
        .send({ fileName: 'Report.docx', content: encode('hello'), outputFormat: 'png' })
        .responseType('blob');

      expect(app.converter.store.openScopes).toBe(0);
      expect(await fs.readdir(workdir)).toEqual([]);
    });

    describe('validation', () => {
      it('should return 400 when a required field is missing', async () => {
        const response = await supertest(app.server)
          .post('/convert')
          .send({ fileName: 'Report.docx', content: encode('hello') });

        expect(response.status).toBe(400);
        expect(response.body.code).toBe('VALIDATION_ERROR');
        expect(response.body.message).toBe("body must have required property 'outputFormat'");
        expect(response.body.correlationId).toBe(response.headers['x-correlation-id']);
      });

      it('should return 400 for an out-of-range option', async () => {
        const response = await supertest(app.server)
          .post('/convert')
          .send({ fileName: 'Report.docx', content: encode('hello'), outputFormat: 'png', options: { dpi: 0 } });

        expect(response.status).toBe(400);
        expect(response.body.message).toBe('body/options/dpi must be >= 1');
      });

      it('should return 400 for an inverted page range', async () => {
        const response = await supertest(app.server)
          .post('/convert')
          .send({
            fileName: 'Report.docx',
            content: encode('hello'),
            outputFormat: 'png',
            options: { firstPage: 3, lastPage: 2 },
          });

        expect(response.status).toBe(400);
        expect(response.body.message).toBe('body/options/firstPage must not be greater than lastPage');
      });

      it('should return 400 when content is not base64', async () => {
        const response = await supertest(app.server)
          .post('/convert')
          .send({ fileName: 'Report.docx', content: '@@not base64@@', outputFormat: 'pdf' });

        expect(response.status).toBe(400);
        expect(response.body.code).toBe('VALIDATION_ERROR');
        expect(response.body.message).toBe('body/content must be base64-encoded');
      });

      it('should return 400 for an empty document', async () => {
        const response = await supertest(app.server)
          .post('/convert')
          .send({ fileName: 'Report.docx', content: '', outputFormat: 'pdf' });

        expect(response.status).toBe(400);
        expect(response.body.code).toBe('INVALID_INPUT');
        expect(response.body.message).toBe('Invalid input: input document is empty');
      });
    });

    describe('unsupported conversions', () => {
      it('should return 422 for a pair with no plan', async () => {
        const response = await supertest(app.server)
          .post('/convert')
          .send({ fileName: 'scan.png', content: encode('img'), outputFormat: 'docx' });

        expect(response.status).toBe(422);
        expect(response.body.code).toBe('UNSUPPORTED_CONVERSION');
        expect(response.body.message).toBe('Unsupported conversion: png to docx');
        expect(response.body.context).toEqual({ inputFormat: 'png', outputFormat: 'docx' });
      });

      it('should return 422 when the input format cannot be determined', async () => {
        const response = await supertest(app.server)
          .post('/convert')
          .send({ fileName: 'notes.xyz', content: encode('?'), outputFormat: 'pdf' });

        expect(response.status).toBe(422);
        expect(response.body.message).toBe('Unsupported conversion: cannot determine the input format of "notes.xyz"');
      });

      it('should return 422 for an unknown output format', async () => {
        const response = await supertest(app.server)
          .post('/convert')
          .send({ fileName: 'Report.docx', content: encode('hello'), outputFormat: 'mp4' });

        expect(response.status).toBe(422);
        expect(response.body.message).toBe('Unsupported conversion: unknown format "mp4"');
      });
    });
  });

  describe('upload limit', () => {
    it('should return 413 when the decoded upload exceeds the limit', async () => {
      const app = await buildApp({}, { maxUploadBytes: 8 });

      const response = await supertest(app.server)
        .post('/convert')
        .send({ fileName: 'Report.docx', content: encode('0123456789abcdef'), outputFormat: 'pdf' });

      expect(response.status).toBe(413);
      expect(response.body.code).toBe('PAYLOAD_TOO_LARGE');
      expect(response.body.message).toBe('Payload too large: upload is 16 bytes, limit is 8');
    });
  });

  describe('engine errors', () => {
    it('should return 502 with the stage and a path-free diagnostic when an engine fails', async () => {
      const app = await buildApp({ officeArgs: ['fail', '{input}'] });

      const response = await supertest(app.server)
        .post('/convert')
        .send({ fileName: 'Report.docx', content: encode('corrupt'), outputFormat: 'pdf' });

      expect(response.status).toBe(502);
      expect(response.body.code).toBe('ENGINE_FAILURE');
      expect(response.body.message).toBe('Conversion failed: office exited with code 3');
      expect(response.body.context).toMatchObject({ stage: 0, engine: 'office', exitCode: 3 });
      expect(response.body.context.diagnostic.split('\n').pop()).toBe('error: cannot read <input>');
      expect(JSON.stringify(response.body)).not.toContain(workdir);
    });

    it('should return 504 when an engine times out', async () => {
      const pidDir = await makeTempDir('routes-pids');
      const pidFile = path.join(pidDir, 'office');
      const app = await buildApp({ officeArgs: ['hang', pidFile], officeTimeoutMs: 1000 });

      try {
        const response = await supertest(app.server)
          .post('/convert')
          .send({ fileName: 'Report.docx', content: encode('hello'), outputFormat: 'pdf' });

        expect(response.status).toBe(504);
        expect(response.body.code).toBe('ENGINE_TIMEOUT');
        expect(response.body.message).toBe('office timed out after 1000ms');
        expect(response.body.context).toMatchObject({ stage: 0, engine: 'office', timeoutMs: 1000 });
        expect(await waitForExit(await readPidFile(pidFile))).toBe(true);
      } finally {
        await fs.rm(pidDir, { recursive: true, force: true });
      }
    });
  });

  describe('client disconnect', () => {
    it('should kill the running engine and clean up when the client goes away', async () => {
      const pidDir = await makeTempDir('routes-pids');
      const pidFile = path.join(pidDir, 'office');
      const disconnectDir = await makeTempDir('routes-disconnect');
      const app = await buildApp({ officeArgs: ['hang', pidFile], officeTimeoutMs: 30000 }, { conversionWorkdir: disconnectDir });

      try {
        const pending = supertest(app.server)
          .post('/convert')
          .send({ fileName: 'Report.docx', content: encode('hello'), outputFormat: 'pdf' })
          .timeout(1500);

        await expect(pending).rejects.toThrow('Timeout of 1500ms exceeded');
        expect(await waitForExit(await readPidFile(pidFile))).toBe(true);
        expect(await waitForEmpty(disconnectDir)).toBe(true);
        expect(app.converter.service.getStats()).toMatchObject({ activeJobs: 0, failedJobs: 1 });
      } finally {
        await fs.rm(pidDir, { recursive: true, force: true });
        await fs.rm(disconnectDir, { recursive: true, force: true });
      }
    });
  });

  describe('storage failures', () => {
    it('should return 503 without host paths when the work directory is unusable', async () => {
      const blocker = path.join(workdir, 'not-a-dir');
      await fs.writeFile(blocker, 'x');
      const app = await buildApp({}, { conversionWorkdir: path.join(blocker, 'work') });

      try {
        const response = await supertest(app.server)
          .post('/convert')
          .send({ fileName: 'Report.docx', content: encode('hello'), outputFormat: 'pdf' });

        expect(response.status).toBe(503);
        expect(response.body.code).toBe('RESOURCE_ERROR');
        expect(response.body.message).toBe('Resource error: cannot create scope directory (ENOTDIR)');
        expect(JSON.stringify(response.body)).not.toContain(workdir);
        expect(JSON.stringify(response.body)).not.toMatch(ABSOLUTE_PATH);
      } finally {
        await fs.rm(blocker, { force: true });
      }
    });
  });

  describe('POST /split', () => {
    it('should return the selected pages of a PDF', async () => {
      const app = await buildApp();

      const response = await supertest(app.server)
        .post('/split')
        .send({ fileName: 'Minutes.pdf', content: encode('%PDF'), pages: '1-2,4' })
        .responseType('blob');

      expect(response.status).toBe(200);
      expect(response.headers['content-type']).toBe('application/pdf');
      expect(response.headers['content-disposition']).toBe('attachment; filename="Minutes-pages.pdf"');
      expect(response.headers['x-conversion-plan']).toBe('split(pdf)');
      expect(Buffer.from(response.body).toString()).toBe('[pages=1-2,4]%PDF');
    });

    it('should return 400 without a page selection', async () => {
      const app = await buildApp();

      const response = await supertest(app.server).post('/split').send({ fileName: 'Minutes.pdf', content: encode('%PDF') });

      expect(response.status).toBe(400);
      expect(response.body.message).toBe('body must have pages, firstPage or lastPage');
    });

    it('should return 400 for a malformed page list', async () => {
      const app = await buildApp();

      const response = await supertest(app.server)
        .post('/split')
        .send({ fileName: 'Minutes.pdf', content: encode('%PDF'), pages: '0-2' });

      expect(response.status).toBe(400);
      expect(response.body.code).toBe('VALIDATION_ERROR');
    });

    it('should return 400 for a backwards range', async () => {
      const app = await buildApp();

      const response = await supertest(app.server)
        .post('/split')
        .send({ fileName: 'Minutes.pdf', content: encode('%PDF'), pages: '1,5-3' });

      expect(response.status).toBe(400);
      expect(response.body.message).toBe('body/pages range 5-3 runs backwards');
    });

    it('should return 422 for a document that is not a PDF', async () => {
      const app = await buildApp();

      const response = await supertest(app.server)
        .post('/split')
        .send({ fileName: 'Report.docx', content: encode('hello'), firstPage: 1 });

      expect(response.status).toBe(422);
      expect(response.body.message).toBe('Unsupported conversion: split takes pdf documents, got Report.docx');
    });
  });

  describe('POST /merge', () => {
    it('should join the uploaded PDFs in order', async () => {
      const app = await buildApp();

      const response = await supertest(app.server)
        .post('/merge')
        .send({
          files: [
            { fileName: 'cover.pdf', content: encode('cover|') },
            { fileName: 'body.pdf', content: encode('body|') },
            { fileName: 'appendix.pdf', content: encode('appendix') },
          ],
        })
        .responseType('blob');

      expect(response.status).toBe(200);
      expect(response.headers['content-disposition']).toBe('attachment; filename="merged.pdf"');
      expect(response.headers['x-conversion-plan']).toBe('merge(pdf)');
      expect(Buffer.from(response.body).toString()).toBe('cover|body|appendix');
    });

    it('should return 400 for a single file', async () => {
      const app = await buildApp();

      const response = await supertest(app.server)
        .post('/merge')
        .send({ files: [{ fileName: 'cover.pdf', content: encode('cover') }] });

      expect(response.status).toBe(400);
      expect(response.body.message).toBe('body/files must NOT have fewer than 2 items');
    });

    it('should name the file whose content is not base64', async () => {
      const app = await buildApp();

      const response = await supertest(app.server)
        .post('/merge')
        .send({
          files: [
            { fileName: 'cover.pdf', content: encode('cover') },
            { fileName: 'body.pdf', content: '@@' },
          ],
        });

      expect(response.status).toBe(400);
      expect(response.body.message).toBe('body/files/1/content must be base64-encoded');
    });

    it('should return 413 when the uploads together exceed the limit', async () => {
      const app = await buildApp({}, { maxUploadBytes: 8 });

      const response = await supertest(app.server)
        .post('/merge')
        .send({
          files: [
            { fileName: 'a.pdf', content: encode('12345') },
            { fileName: 'b.pdf', content: encode('67890') },
          ],
        });

      expect(response.status).toBe(413);
      expect(response.body.message).toBe('Payload too large: uploads total 10 bytes, limit is 8');
    });

    it('should return 422 when merging is not enabled', async () => {
      const app = await buildApp({}, { enabledEngines: ['office'] });

      const response = await supertest(app.server)
        .post('/merge')
        .send({
          files: [
            { fileName: 'a.pdf', content: encode('a') },
            { fileName: 'b.pdf', content: encode('b') },
          ],
        });

      expect(response.status).toBe(422);
      expect(response.body.message).toBe('Unsupported conversion: merge is not available');
    });
  });

  describe('GET /formats', () => {
    it('should list formats and supported conversions', async () => {
      const app = await buildApp();

      const response = await supertest(app.server).get('/formats');

      expect(response.status).toBe(200);
      expect(response.body.formats.map((format: { tag: string }) => format.tag)).toEqual([
        'docx',
        'odt',
        'pdf',
        'png',
        'jpg',
      ]);
      expect(response.body.formats[4]).toEqual({
        tag: 'jpg',
        extension: 'jpg',
        mediaType: 'image/jpeg',
        family: 'image',
      });
      expect(response.body.conversions).toHaveLength(8);
      expect(response.body.conversions).toContainEqual({
        input: 'docx',
        output: 'png',
        stages: 2,
        engines: ['office', 'raster'],
      });
      expect(response.body.operations).toEqual([
        { operation: 'split', format: 'pdf', engine: 'pager' },
        { operation: 'merge', format: 'pdf', engine: 'joiner' },
      ]);
    });

    it('should only list conversions of enabled engines', async () => {
      const app = await buildApp({}, { enabledEngines: ['office'] });

      const response = await supertest(app.server).get('/formats');

      expect(response.status).toBe(200);
      expect(response.body.conversions.map((c: { input: string; output: string }) => `${c.input}>${c.output}`)).toEqual([
        'docx>odt',
        'docx>pdf',
        'odt>docx',
        'odt>pdf',
      ]);
    });
  });
});
