/**
 * Unit tests for writing archives to files
 */

import { unzipSync } from 'fflate';
import { FileSink, createZipFile } from '../../../src/node';
import { ZipWriter } from '../../../src/core/ZipWriter';
import { isZipError } from '../../../src/core/ZipError';
import { Logger } from '../../../src/core/components/Logger';
import { readEnd } from '../../helpers/zipRecords';
import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';

describe('FileSink', () => {
  let tempDir: string;
  const loggerConfig = Logger.getConfig();

  beforeAll(() => {
    Logger.setLevel('silent');
  });

  afterAll(() => {
    Logger.configure(loggerConfig);
  });

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'zipsink-test-'));
  });

  afterEach(() => {
    if (fs.existsSync(tempDir)) {
      fs.rmSync(tempDir, { recursive: true, force: true });
    }
  });

  describe('write / close', () => {
    it('should write buffers in order', () => {
      const filePath = path.join(tempDir, 'plain.bin');
      const sink = new FileSink(filePath);
      sink.write(Buffer.from('abc'));
      sink.write(Buffer.alloc(0));
      sink.write(Buffer.from('def'));
      sink.close();

      expect(sink.bytesWritten).toBe(6);
      expect(fs.readFileSync(filePath).toString()).toBe('abcdef');
    });

    it('should create missing parent directories', () => {
      const filePath = path.join(tempDir, 'nested', 'deeper', 'out.zip');
      const sink = new FileSink(filePath);
      sink.close();

      expect(fs.existsSync(filePath)).toBe(true);
      expect(sink.filePath).toBe(filePath);
    });

    it('should truncate an existing file', () => {
      const filePath = path.join(tempDir, 'existing.zip');
      fs.writeFileSync(filePath, 'previous content that is longer');

      const sink = new FileSink(filePath);
      sink.write(Buffer.from('new'));
      sink.close();

      expect(fs.readFileSync(filePath).toString()).toBe('new');
    });

    it('should reject writes after close', () => {
      const sink = new FileSink(path.join(tempDir, 'closed.zip'));
      sink.close();
      sink.close();

      expect(sink.isOpen).toBe(false);
      expect(() => sink.write(Buffer.from('x'))).toThrow('Output sink is closed');
    });

    it('should surface a closed file as IoError', () => {
      const sink = new FileSink(path.join(tempDir, 'closed.zip'));
      sink.close();
      const zip = new ZipWriter(sink);

      let error: unknown;
      try {
        zip.addEntry('a.txt', Buffer.from('a'), 'stored');
      } catch (e) {
        error = e;
      }
      expect(isZipError(error, 'IoError')).toBe(true);
      expect(error).toMatchObject({ cause: expect.objectContaining({ message: 'Output sink is closed' }) });
      expect(zip.state).toBe('busy');
    });
  });

  describe('createZipFile', () => {
    it('should write a readable archive', () => {
      const filePath = path.join(tempDir, 'archive.zip');
      const added = createZipFile(filePath, zip => {
        zip.addEntry('hello.txt', Buffer.from('Hello, world!'), 'default')
          .addEntry('raw/data.bin', Buffer.from([0, 1, 2, 3, 255]), 'stored');
        return zip.entryCount;
      }, { clock: () => 1608905123 });

      expect(added).toBe(2);
      const files = unzipSync(fs.readFileSync(filePath));
      expect(Object.keys(files)).toEqual(['hello.txt', 'raw/data.bin']);
      expect(Buffer.from(files['hello.txt']).toString()).toBe('Hello, world!');
      expect(Array.from(files['raw/data.bin'])).toEqual([0, 1, 2, 3, 255]);
    });

    it('should finalize and close the file when the callback throws', () => {
      const filePath = path.join(tempDir, 'partial.zip');
      expect(() =>
        createZipFile(filePath, zip => {
          zip.addEntry('first.txt', Buffer.from('first'), 'stored');
          throw new Error('second source failed');
        })
      ).toThrow('second source failed');

      const archive = fs.readFileSync(filePath);
      expect(readEnd(archive).totalRecords).toBe(1);
      expect(Buffer.from(unzipSync(archive)['first.txt']).toString()).toBe('first');
    });

    it('should write an empty archive when nothing is added', () => {
      const filePath = path.join(tempDir, 'empty.zip');
      createZipFile(filePath, () => undefined);

      expect(fs.readFileSync(filePath).toString('hex')).toBe('504b0506' + '00'.repeat(18));
    });
  });
});
