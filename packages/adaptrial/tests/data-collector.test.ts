import { mkdtemp, readFile, rm, stat } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import {
  CSVStringifier,
  DataCollector,
  DataStringifier,
  JSONStringifier,
} from '../src/data-collector';
import type { Data } from '../types';

describe('DataStringifier', () => {
  it('should initialize with empty value', () => {
    class TestStringifier extends DataStringifier {
      transform() {
        return 'test';
      }
      final() {
        return 'final';
      }
    }

    expect(new TestStringifier().value).toBe('');
  });

  describe('CSVStringifier', () => {
    let stringifier: CSVStringifier;

    beforeEach(() => {
      stringifier = new CSVStringifier();
    });

    it('should initialize with empty value and keys', () => {
      expect(stringifier.value).toBe('');
      expect(stringifier.keys).toEqual([]);
    });

    it('should escape values', () => {
      expect(stringifier.normalize(null)).toBe('');
      expect(stringifier.normalize(undefined)).toBe('');
      expect(stringifier.normalize('simple')).toBe('simple');
      expect(stringifier.normalize('text,with,commas')).toBe(
        '"text,with,commas"',
      );
      expect(stringifier.normalize('text"with"quotes')).toBe(
        '"text""with""quotes"',
      );
      expect(stringifier.normalize('text\nwith\nnewlines')).toBe(
        '"text\nwith\nnewlines"',
      );
      expect(stringifier.normalize('a\rb')).toBe('"a\rb"');
      expect(stringifier.normalize(123)).toBe('123');
      expect(stringifier.normalize(true)).toBe('true');
    });

    it('should generate CSV header on first transform', () => {
      const chunk = stringifier.transform({ intensity: 50, response: true });

      expect(stringifier.keys).toEqual(['intensity', 'response']);
      expect(chunk).toBe('intensity,response\n50,true');
      expect(stringifier.value).toBe('intensity,response\n50,true');
    });

    it('should not regenerate header on subsequent transforms', () => {
      stringifier.transform({ intensity: 50, response: true });
      const chunk = stringifier.transform({ intensity: 42, response: false });

      expect(chunk).toBe('\n42,false');
      expect(stringifier.value).toBe(
        'intensity,response\n50,true\n42,false',
      );
    });

    it('should escape keys and values', () => {
      const chunk = stringifier.transform({
        'label, long': 'Say "hi"',
        note: 'line 1\nline 2',
      });

      expect(chunk).toBe(
        '"label, long",note\n"Say ""hi""","line 1\nline 2"',
      );
    });

    it('should leave null and undefined cells empty', () => {
      const chunk = stringifier.transform({
        name: 'tone',
        rt: null,
        key: undefined,
      });

      expect(chunk).toBe('name,rt,key\ntone,,');
    });

    it('should only use the keys of the first row', () => {
      stringifier.transform({ a: 1, b: 2 });
      const chunk = stringifier.transform({ b: 3, c: 4 });

      expect(chunk).toBe('\n,3');
    });

    it('should return empty string from final()', () => {
      expect(stringifier.final()).toBe('');
    });
  });

  describe('JSONStringifier', () => {
    let stringifier: JSONStringifier;

    beforeEach(() => {
      stringifier = new JSONStringifier();
    });

    it('should start a JSON array on first transform', () => {
      const chunk = stringifier.transform({ intensity: 50 });

      expect(chunk).toBe('[{"intensity":50}');
    });

    it('should add a comma before subsequent objects', () => {
      stringifier.transform({ intensity: 50 });
      const chunk = stringifier.transform({ intensity: 42 });

      expect(chunk).toBe(',{"intensity":42}');
      expect(stringifier.value).toBe('[{"intensity":50},{"intensity":42}');
    });

    it('should drop undefined values', () => {
      const chunk = stringifier.transform({ a: true, b: null, c: undefined });

      expect(chunk).toBe('[{"a":true,"b":null}');
    });

    it('should close the array in final()', () => {
      stringifier.transform({ intensity: 50 });

      expect(stringifier.final()).toBe(']');
      expect(stringifier.value).toBe('[{"intensity":50}]');
    });

    it('should write an empty array without rows', () => {
      expect(stringifier.final()).toBe('[]');
      expect(stringifier.value).toBe('[]');
    });
  });
});

describe('DataCollector', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'adaptrial-'));
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'info').mockImplementation(() => {});
  });
  afterEach(async () => {
    delete DataCollector.stringifiers.custom;
    await rm(dir, { recursive: true, force: true });
  });

  describe('constructor', () => {
    it('should default to a timestamped CSV file', () => {
      const collector = new DataCollector();

      expect(collector.filename).toMatch(/^data-\d+\.csv$/);
      expect(collector.stringifier).toBeInstanceOf(CSVStringifier);
      expect(collector.rows).toEqual([]);
    });

    it('should pick the stringifier by extension', () => {
      const collector = new DataCollector('staircase.json');

      expect(collector.stringifier).toBeInstanceOf(JSONStringifier);
    });

    it('should prefer a given stringifier', () => {
      const stringifier = new JSONStringifier();
      const collector = new DataCollector('test.csv', stringifier);

      expect(collector.stringifier).toBe(stringifier);
    });

    it('should warn and use CSV for an unknown extension', () => {
      const collector = new DataCollector('test.xml');

      expect(console.warn).toHaveBeenCalledWith(
        'Please specify a valid file extension: csv, json, but got "xml"',
      );
      expect(collector.stringifier).toBeInstanceOf(CSVStringifier);
    });

    it('should warn and use CSV without an extension', () => {
      const collector = new DataCollector('test');

      expect(console.warn).toHaveBeenCalledWith(
        'Please specify the file extension in the filename',
      );
      expect(collector.stringifier).toBeInstanceOf(CSVStringifier);
    });

    it('should accept custom stringifiers', () => {
      class CustomStringifier extends DataStringifier {
        transform(data: Data) {
          return Object.values(data).join('\t');
        }
        final() {
          return '';
        }
      }
      DataCollector.stringifiers.custom = CustomStringifier;

      const collector = new DataCollector('test.custom');

      expect(collector.stringifier).toBeInstanceOf(CustomStringifier);
    });
  });

  describe('add', () => {
    it('should keep rows and return the chunk', () => {
      const collector = new DataCollector('test.csv');

      const chunk = collector.add({ trial: 0, intensity: 50 });
      collector.add({ trial: 1, intensity: 42 });

      expect(chunk).toBe('trial,intensity\n0,50');
      expect(collector.rows).toEqual([
        { trial: 0, intensity: 50 },
        { trial: 1, intensity: 42 },
      ]);
      expect(console.info).toHaveBeenCalledWith('data', {
        trial: 1,
        intensity: 42,
      });
    });

    it('should emit the row with its chunk', () => {
      const collector = new DataCollector('test.csv');
      const listener = vi.fn();
      collector.on('add', listener);

      collector.add({ name: 'tone', value: 123 });

      expect(listener).toHaveBeenCalledWith({
        row: { name: 'tone', value: 123 },
        chunk: 'name,value\ntone,123',
      });
    });
  });

  describe('save', () => {
    it('should write a CSV file', async () => {
      const filename = join(dir, 'run.csv');
      const collector = new DataCollector(filename);
      collector.add({ intensity: 50, response: true });
      collector.add({ intensity: 42, response: false });

      await collector.save();

      expect(await readFile(filename, 'utf8')).toBe(
        'intensity,response\n50,true\n42,false',
      );
    });

    it('should write a closed JSON array', async () => {
      const filename = join(dir, 'run.json');
      const collector = new DataCollector(filename);
      collector.add({ trial: 0 });
      collector.add({ trial: 1 });

      await collector.save();

      expect(await readFile(filename, 'utf8')).toBe('[{"trial":0},{"trial":1}]');
    });

    it('should not write a file without rows', async () => {
      const filename = join(dir, 'empty.csv');

      await new DataCollector(filename).save();

      await expect(stat(filename)).rejects.toThrow();
    });

    it('should let a listener take over the data', async () => {
      const filename = join(dir, 'run.json');
      const collector = new DataCollector(filename);
      collector.add({ trial: 0 });
      const chunks: string[] = [];
      collector.on('save', ({ chunk, preventDefault }) => {
        chunks.push(chunk);
        preventDefault();
      });

      await collector.save();

      expect(chunks).toEqual([']']);
      await expect(stat(filename)).rejects.toThrow();
    });

    it('should only save once', async () => {
      const collector = new DataCollector(join(dir, 'run.csv'));
      const listener = vi.fn();
      collector.on('save', listener);

      await collector.save();
      await collector.save();

      expect(listener).toHaveBeenCalledTimes(1);
      expect(console.warn).toHaveBeenCalledWith('Repeated save is not allowed');
    });

    it('should write with a suffix', async () => {
      const filename = join(dir, 'run.csv');
      const collector = new DataCollector(filename);
      collector.add({ trial: 0 });

      await collector.write('.partial');

      expect(await readFile(filename + '.partial', 'utf8')).toBe('trial\n0');
    });

    it('should report the file it cannot write', async () => {
      const filename = join(dir, 'missing', 'run.csv');
      const collector = new DataCollector(filename);
      collector.add({ trial: 0 });

      await expect(collector.save()).rejects.toThrow(`Cannot write ${filename}`);
    });
  });
});
