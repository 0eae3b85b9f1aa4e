import { describe, it, expect, afterAll } from '@jest/globals';
import { promises as fs } from 'fs';
import path from 'path';
import { applyEngineOverrides, loadFormatTable, parseFormatTable, renderArgs, renderStageCommand, renderString } from '../../src/formats';
import { FormatResolver } from '../../src/formats';
import { ConfigurationError } from '../../src/errors';
import { makeTempDir } from '../helpers/fake-engines';

const noOverrides = { enginePaths: {}, engineTimeouts: {} };

function minimalTable(): Record<string, unknown> {
  return {
    formats: [
      { tag: 'docx', extension: 'docx', mediaType: 'application/x-docx', family: 'text', nativeSuite: 'office' },
      { tag: 'pdf', extension: 'pdf', mediaType: 'application/pdf', family: 'pdf', nativeSuite: 'poppler' },
    ],
    engines: [
      {
        id: 'soffice',
        suite: 'office',
        command: 'soffice',
        args: ['{input}'],
        output: { kind: 'file', name: '{stem}.{extension}' },
        timeoutMs: 1000,
      },
    ],
    edges: [{ engine: 'soffice', from: ['docx'], to: ['pdf'] }],
  };
}

describe('format table', () => {
  describe('loadFormatTable', () => {
    const tempDirs: string[] = [];

    afterAll(async () => {
      await Promise.all(tempDirs.map((dir) => fs.rm(dir, { recursive: true, force: true })));
    });

    it('should load the bundled table by default', () => {
      const table = loadFormatTable(noOverrides);

      expect(table.formats).toHaveLength(18);
      expect(table.engines.map((engine) => engine.id)).toEqual([
        'soffice',
        'unoconv',
        'pdftoppm',
        'ghostscript',
        'imagemagick',
        'pdfwrite',
        'pdfunite',
        'calibre',
      ]);
      expect(table.operations).toEqual([
        { id: 'split', engine: 'pdfwrite', format: 'pdf' },
        { id: 'merge', engine: 'pdfunite', format: 'pdf' },
      ]);
    });

    it('should apply engine binary and timeout overrides', () => {
      const table = loadFormatTable({
        enginePaths: { soffice: '/opt/office/program/soffice' },
        engineTimeouts: { pdftoppm: 5000 },
      });

      const soffice = table.engines.find((engine) => engine.id === 'soffice');
      const pdftoppm = table.engines.find((engine) => engine.id === 'pdftoppm');
      expect(soffice?.command).toBe('/opt/office/program/soffice');
      expect(soffice?.timeoutMs).toBe(120000);
      expect(pdftoppm?.timeoutMs).toBe(5000);
    });

    it('should load a table from FORMAT_TABLE_PATH', async () => {
      const dir = await makeTempDir('format-table');
      tempDirs.push(dir);
      const tablePath = path.join(dir, 'table.json');
      await fs.writeFile(tablePath, JSON.stringify(minimalTable()));

      const table = loadFormatTable({ ...noOverrides, formatTablePath: tablePath });

      expect(table.formats.map((format) => format.tag)).toEqual(['docx', 'pdf']);
    });

    it('should report an unreadable table file', () => {
      expect(() => loadFormatTable({ ...noOverrides, formatTablePath: '/nonexistent/table.json' })).toThrow(
        /^Configuration error: cannot read format table \/nonexistent\/table\.json/
      );
    });
  });

  describe('parseFormatTable', () => {
    it('should accept a well-formed table', () => {
      const table = parseFormatTable(minimalTable());
      expect(table.edges).toEqual([{ engine: 'soffice', from: ['docx'], to: ['pdf'] }]);
    });

    it('should reject a non-object root', () => {
      expect(() => parseFormatTable(null)).toThrow('Configuration error: format table: root must be an object');
    });

    it('should reject an unknown family', () => {
      const raw = minimalTable();
      raw.formats = [{ tag: 'x', extension: 'x', mediaType: 'x/x', family: 'video', nativeSuite: 'office' }];

      expect(() => parseFormatTable(raw)).toThrow(ConfigurationError);
      expect(() => parseFormatTable(raw)).toThrow(/formats\[0\]\.family must be one of/);
    });

    it('should reject a non-positive timeout', () => {
      const raw = minimalTable();
      raw.engines = [
        { id: 'soffice', suite: 'office', command: 'soffice', args: [], output: { kind: 'file', name: 'x' }, timeoutMs: 0 },
      ];

      expect(() => parseFormatTable(raw)).toThrow('format table: engines[0].timeoutMs must be a positive integer');
    });

    it('should reject a timeout longer than a timer can wait', () => {
      const raw = minimalTable();
      raw.engines = [
        { id: 'soffice', suite: 'office', command: 'soffice', args: [], output: { kind: 'file', name: 'x' }, timeoutMs: 2 ** 31 },
      ];

      expect(() => parseFormatTable(raw)).toThrow(
        'format table: engines[0].timeoutMs must be a positive integer no greater than 2147483647'
      );
    });

    it('should reject a conditional group on an unknown option', () => {
      const raw = minimalTable();
      raw.engines = [
        {
          id: 'soffice',
          suite: 'office',
          command: 'soffice',
          args: [{ when: 'colour', args: ['-c'] }],
          output: { kind: 'file', name: 'x' },
          timeoutMs: 1000,
        },
      ];

      expect(() => parseFormatTable(raw)).toThrow(/engines\[0\]\.args\[0\]\.when must be one of/);
    });

    it('should reject an unknown output kind', () => {
      const raw = minimalTable();
      raw.engines = [
        { id: 'soffice', suite: 'office', command: 'soffice', args: [], output: { kind: 'stream' }, timeoutMs: 1000 },
      ];

      expect(() => parseFormatTable(raw)).toThrow('format table: engines[0].output.kind must be "file" or "sequence"');
    });

    it('should reject edges naming undeclared engines or formats', () => {
      const unknownEngine = minimalTable();
      unknownEngine.edges = [{ engine: 'unoconv', from: ['docx'], to: ['pdf'] }];
      expect(() => parseFormatTable(unknownEngine)).toThrow('format table: edges[0] uses unknown engine "unoconv"');

      const unknownFormat = minimalTable();
      unknownFormat.edges = [{ engine: 'soffice', from: ['docx'], to: ['png'] }];
      expect(() => parseFormatTable(unknownFormat)).toThrow('format table: edges[0] uses unknown format "png"');
    });

    it('should reject duplicate formats and aliases', () => {
      const raw = minimalTable();
      raw.formats = [
        { tag: 'jpg', extension: 'jpg', mediaType: 'image/jpeg', family: 'image', nativeSuite: 'imagemagick', aliases: ['jpeg'] },
        { tag: 'jpeg', extension: 'jpeg', mediaType: 'image/jpeg', family: 'image', nativeSuite: 'imagemagick' },
      ];
      raw.edges = [];

      expect(() => parseFormatTable(raw)).toThrow('format table: format "jpeg" is declared twice');
    });

    it('should reject a conditional group without any condition', () => {
      const raw = minimalTable();
      raw.engines = [
        {
          id: 'soffice',
          suite: 'office',
          command: 'soffice',
          args: [{ args: ['--always'] }],
          output: { kind: 'file', name: 'x' },
          timeoutMs: 1000,
        },
      ];

      expect(() => parseFormatTable(raw)).toThrow(
        'format table: engines[0].args[0] must be a group with when, formats or inputs'
      );
    });

    it('should default to no operations', () => {
      expect(parseFormatTable(minimalTable()).operations).toEqual([]);
    });

    it('should reject operations naming undeclared engines or formats', () => {
      const unknownEngine = minimalTable();
      unknownEngine.operations = [{ id: 'split', engine: 'gs', format: 'pdf' }];
      expect(() => parseFormatTable(unknownEngine)).toThrow('format table: operations[0] uses unknown engine "gs"');

      const unknownFormat = minimalTable();
      unknownFormat.operations = [{ id: 'split', engine: 'soffice', format: 'djvu' }];
      expect(() => parseFormatTable(unknownFormat)).toThrow('format table: operations[0] uses unknown format "djvu"');

      const unknownOperation = minimalTable();
      unknownOperation.operations = [{ id: 'rotate', engine: 'soffice', format: 'pdf' }];
      expect(() => parseFormatTable(unknownOperation)).toThrow('format table: operations[0].id must be one of split, merge');
    });

    it('should require a multi-input engine for merge', () => {
      const raw = minimalTable();
      raw.operations = [{ id: 'merge', engine: 'soffice', format: 'pdf' }];

      expect(() => parseFormatTable(raw)).toThrow(
        'format table: operations[0] merges with "soffice", which takes one input'
      );
    });

    it('should reject an operation declared twice', () => {
      const raw = minimalTable();
      raw.operations = [
        { id: 'split', engine: 'soffice', format: 'pdf' },
        { id: 'split', engine: 'soffice', format: 'pdf' },
      ];

      expect(() => parseFormatTable(raw)).toThrow('format table: operation "split" is declared twice');
    });
  });

  describe('applyEngineOverrides', () => {
    it('should leave engines without overrides untouched', () => {
      const table = parseFormatTable(minimalTable());
      const overridden = applyEngineOverrides(table, noOverrides);

      expect(overridden.engines[0]).toEqual(table.engines[0]);
      expect(overridden).not.toBe(table);
    });
  });
});

describe('command templates', () => {
  describe('renderString', () => {
    it('should substitute every placeholder', () => {
      expect(renderString('-sOutputFile={output}-%d.{extension}', { output: '/w/page', extension: 'tif' })).toBe(
        '-sOutputFile=/w/page-%d.tif'
      );
    });

    it('should fail on a placeholder without a value', () => {
      expect(() => renderString('-r{dpi}', {})).toThrow('Configuration error: template token {dpi} has no value');
    });
  });

  describe('renderArgs', () => {
    const template = [
      '{input}',
      { when: 'quality' as const, args: ['-quality', '{quality}'], formats: ['jpg'] },
      { when: 'pageSize' as const, args: ['-page', '{pageSize}'] },
      '{output}',
    ];

    it('should drop groups whose option is unset', () => {
      expect(renderArgs(template, { input: 'in.png', output: 'out.jpg', quality: '80' }, { input: 'png', output: 'jpg' })).toEqual([
        'in.png',
        '-quality',
        '80',
        'out.jpg',
      ]);
    });

    it('should drop groups restricted to other output formats', () => {
      expect(
        renderArgs(template, { input: 'in.png', output: 'out.pdf', quality: '80', pageSize: 'A4' }, { input: 'png', output: 'pdf' })
      ).toEqual(['in.png', '-page', 'A4', 'out.pdf']);
    });

    it('should keep groups restricted to the stage input format', () => {
      const office = ['--headless', { inputs: ['pdf'], args: ['--infilter=writer_pdf_import'] }, '{input}'];

      expect(renderArgs(office, { input: 'in.pdf' }, { input: 'pdf', output: 'docx' })).toEqual([
        '--headless',
        '--infilter=writer_pdf_import',
        'in.pdf',
      ]);
      expect(renderArgs(office, { input: 'in.odt' }, { input: 'odt', output: 'docx' })).toEqual(['--headless', 'in.odt']);
    });

    it('should expand {inputs} to every input file', () => {
      expect(renderArgs(['{inputs}', '{output}'], { output: 'merged.pdf' }, { input: 'pdf', output: 'pdf' }, ['a.pdf', 'b.pdf'])).toEqual([
        'a.pdf',
        'b.pdf',
        'merged.pdf',
      ]);
    });

    it('should fail on {inputs} without input files', () => {
      expect(() => renderArgs(['{inputs}'], {}, { input: 'pdf', output: 'pdf' })).toThrow(
        'Configuration error: template token {inputs} has no value'
      );
    });
  });

  describe('renderStageCommand', () => {
    const resolver = new FormatResolver(loadFormatTable(noOverrides));
    const paths = {
      inputPath: '/work/stage-0/in/input.docx',
      outdir: '/work/stage-0/out',
      profileDir: '/work/stage-0/profile',
    };

    it('should render the office suite command with a private profile', () => {
      const [stage] = resolver.resolve('docx', 'pdf').stages;
      const command = renderStageCommand(stage, resolver.getFormat('pdf'), paths, {});

      expect(command).toEqual({
        command: 'soffice',
        args: [
          '--headless',
          '--norestore',
          '--nolockcheck',
          '--nodefault',
          '-env:UserInstallation=file:///work/stage-0/profile',
          '--convert-to',
          'pdf',
          '--outdir',
          '/work/stage-0/out',
          '/work/stage-0/in/input.docx',
        ],
        outputName: 'input.pdf',
      });
    });

    it('should use the office filter name as the conversion target', () => {
      const [stage] = resolver.resolve('odt', 'docx').stages;
      const command = renderStageCommand(
        stage,
        resolver.getFormat('docx'),
        { ...paths, inputPath: '/work/stage-0/in/input.odt' },
        {}
      );

      expect(command.args).toContain('docx:MS Word 2007 XML');
      expect(command.outputName).toBe('input.docx');
    });

    it('should render rasterizer options for JPEG pages', () => {
      const [, stage] = resolver.resolve('docx', 'jpg').stages;
      const command = renderStageCommand(
        stage,
        resolver.getFormat('jpg'),
        { inputPath: '/work/stage-1/in/input.pdf', outdir: '/work/stage-1/out', profileDir: '/work/stage-1/profile' },
        { dpi: 72, quality: 80, firstPage: 2 }
      );

      expect(command).toEqual({
        command: 'pdftoppm',
        args: ['-jpeg', '-r', '72', '-jpegopt', 'quality=80', '-f', '2', '/work/stage-1/in/input.pdf', '/work/stage-1/out/page'],
        outputName: 'page',
      });
    });

    it('should default the resolution and skip the JPEG options for PNG', () => {
      const [stage] = resolver.resolve('pdf', 'png').stages;
      const command = renderStageCommand(
        stage,
        resolver.getFormat('png'),
        { inputPath: '/w/in/input.pdf', outdir: '/w/out', profileDir: '/w/profile' },
        { quality: 80 }
      );

      expect(command.args).toEqual(['-png', '-r', '150', '/w/in/input.pdf', '/w/out/page']);
    });

    it('should render the ghostscript page pattern', () => {
      const [stage] = resolver.resolve('pdf', 'tiff').stages;
      const command = renderStageCommand(
        stage,
        resolver.getFormat('tiff'),
        { inputPath: '/w/in/input.pdf', outdir: '/w/out', profileDir: '/w/profile' },
        { dpi: 300, lastPage: 3 }
      );

      expect(command).toEqual({
        command: 'gs',
        args: [
          '-dNOPAUSE',
          '-dBATCH',
          '-dSAFER',
          '-dQUIET',
          '-sDEVICE=tiff24nc',
          '-r300',
          '-dLastPage=3',
          '-sOutputFile=/w/out/page-%d.tif',
          '/w/in/input.pdf',
        ],
        outputName: 'page',
      });
    });

    it('should pass the page size to image -> PDF stages', () => {
      const [stage] = resolver.resolve('png', 'pdf').stages;
      const command = renderStageCommand(
        stage,
        resolver.getFormat('pdf'),
        { inputPath: '/w/in/input.png', outdir: '/w/out', profileDir: '/w/profile' },
        { pageSize: 'A4' }
      );

      expect(command).toEqual({
        command: 'convert',
        args: ['/w/in/input.png', '-page', 'A4', '/w/out/output.pdf'],
        outputName: 'output.pdf',
      });
    });

    it('should import PDF through the office suite with the PDF filter', () => {
      const [stage] = resolver.resolve('pdf', 'docx').stages;
      const command = renderStageCommand(
        stage,
        resolver.getFormat('docx'),
        { ...paths, inputPath: '/work/stage-0/in/input.pdf' },
        {}
      );

      expect(command.args).toEqual([
        '--headless',
        '--norestore',
        '--nolockcheck',
        '--nodefault',
        '-env:UserInstallation=file:///work/stage-0/profile',
        '--infilter=writer_pdf_import',
        '--convert-to',
        'docx:MS Word 2007 XML',
        '--outdir',
        '/work/stage-0/out',
        '/work/stage-0/in/input.pdf',
      ]);
      expect(command.outputName).toBe('input.docx');
    });

    it('should render a page list for splitting', () => {
      const [stage] = resolver.resolveOperation('split').stages;
      const command = renderStageCommand(
        stage,
        resolver.getFormat('pdf'),
        { inputPath: '/w/in/input.pdf', outdir: '/w/out', profileDir: '/w/profile' },
        { pages: '1-3,5' }
      );

      expect(command).toEqual({
        command: 'gs',
        args: [
          '-dNOPAUSE',
          '-dBATCH',
          '-dSAFER',
          '-dQUIET',
          '-sDEVICE=pdfwrite',
          '-sPageList=1-3,5',
          '-sOutputFile=/w/out/pages.pdf',
          '/w/in/input.pdf',
        ],
        outputName: 'pages.pdf',
      });
    });

    it('should pass every input to the merge engine in order', () => {
      const [stage] = resolver.resolveOperation('merge').stages;
      const command = renderStageCommand(
        stage,
        resolver.getFormat('pdf'),
        {
          inputPath: '/w/in/input-1.pdf',
          inputPaths: ['/w/in/input-1.pdf', '/w/in/input-2.pdf', '/w/in/input-3.pdf'],
          outdir: '/w/out',
          profileDir: '/w/profile',
        },
        {}
      );

      expect(command).toEqual({
        command: 'pdfunite',
        args: ['/w/in/input-1.pdf', '/w/in/input-2.pdf', '/w/in/input-3.pdf', '/w/out/merged.pdf'],
        outputName: 'merged.pdf',
      });
    });
  });
});
