import { writeFile } from 'node:fs/promises';
import { extname } from 'node:path';
import type { Data, Primitive } from '../types';
import { EventEmitter } from './util';

// stringifiers
/** One-time string transformation */
export abstract class DataStringifier {
  value = '';
  /**
   * Transform a data object into a string chunk, and append it to the collector
   *
   * @param data - The data object to transform
   * @returns String representation of the data
   */
  abstract transform(data: Data): string;
  /**
   * Create the final chunk, and append it to the collector
   *
   * @returns Final string chunk
   */
  abstract final(): string;
}
/** @see {@link https://www.rfc-editor.org/rfc/rfc4180 | RFC-4180} */
export class CSVStringifier extends DataStringifier {
  keys: string[] = [];
  normalize(value: Primitive) {
    if (value == null) return '';
    value = '' + value;
    return /[,"\n\r]/.test(value) ? `"${value.replaceAll('"', '""')}"` : value;
  }
  transform(data: Data) {
    let chunk = '';
    if (this.keys.length === 0) {
      this.keys = Object.keys(data);
      chunk = this.keys.map((key) => this.normalize(key)).join(',');
    }
    chunk += '\n' + this.keys.map((key) => this.normalize(data[key])).join(',');
    this.value += chunk;
    return chunk;
  }
  final() {
    return '';
  }
}
/** @see {@link https://www.json.org | JSON} */
export class JSONStringifier extends DataStringifier {
  transform(data: Data) {
    const chunk = (this.value === '' ? '[' : ',') + JSON.stringify(data);
    this.value += chunk;
    return chunk;
  }
  final() {
    const chunk = this.value === '' ? '[]' : ']';
    this.value += chunk;
    return chunk;
  }
}

/** One-time data collector. Collect, stringify and save trial rows. */
export class DataCollector<T extends Data> extends EventEmitter<{
  add: { row: T; chunk: string };
  save: { chunk: string; preventDefault: () => void };
}> {
  /**
   * Stringifier classes by file extension, extend it for other formats
   *
   * @example
   *
   * ```ts
   * DataCollector.stringifiers.tsv = class extends DataStringifier {
   *   transform(row: Data) {
   *     const chunk = Object.values(row).join('\t') + '\n';
   *     this.value += chunk;
   *     return chunk;
   *   }
   *   final() {
   *     return '';
   *   }
   * };
   * ```
   */
  static readonly stringifiers: Record<string, new () => DataStringifier> = {
    csv: CSVStringifier,
    json: JSONStringifier,
  };
  #saved = false;
  readonly rows: T[] = [];
  readonly stringifier: DataStringifier;
  /**
   * @param filename Default is `data-${Date.now()}.csv`
   * @param stringifier If not provided, it is picked by the file extension
   */
  constructor(
    public readonly filename = `data-${Date.now()}.csv`,
    stringifier?: DataStringifier,
  ) {
    super();

    const defaultExt = 'csv';
    let ext = extname(filename).slice(1);
    if (!ext) {
      console.warn('Please specify the file extension in the filename');
      ext = defaultExt;
    }
    const Stringifier = DataCollector.stringifiers[ext];
    if (stringifier) {
      this.stringifier = stringifier;
    } else if (Stringifier) {
      this.stringifier = new Stringifier();
    } else {
      const extnames = Object.keys(DataCollector.stringifiers);
      console.warn(
        `Please specify a valid file extension: ${extnames.join(', ')}, but got "${ext}"`,
      );
      this.stringifier = new CSVStringifier();
    }
  }
  /**
   * Add a data row
   *
   * Values must be primitive, stringify arrays and objects first.
   */
  add(row: T) {
    console.info('data', row);
    this.rows.push(row);
    const chunk = this.stringifier.transform(row);
    this.emit('add', { row, chunk });
    return chunk;
  }
  /**
   * Write data to disk
   *
   * It is one-time, subsequent calls are ignored. A `save` listener can call
   * `preventDefault` to handle the data itself.
   */
  async save() {
    if (this.#saved) {
      console.warn('Repeated save is not allowed');
      return;
    }
    this.#saved = true;
    const chunk = this.stringifier.final();

    let hasPrevented = false;
    this.emit('save', {
      chunk,
      preventDefault: () => (hasPrevented = true),
    });
    if (!hasPrevented) await this.write();
  }
  /** Write collected data to `filename + suffix` */
  async write(suffix = '') {
    if (this.rows.length === 0) return;
    const filename = this.filename + suffix;
    try {
      await writeFile(filename, this.stringifier.value, 'utf8');
    } catch (error) {
      throw new Error(`Cannot write ${filename}`, { cause: error });
    }
  }
}
