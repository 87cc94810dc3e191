import { emitKeypressEvents, type Key } from 'node:readline';

/** Where the subject's answer of a trial comes from */
export interface ResponseSource {
  /** Resolve with `true` for a correct (detected) trial */
  get(intensity: number): Promise<boolean>;
  /** Release whatever the source holds */
  close?(): void;
}

/** Deterministic observer who detects everything at or above `threshold` */
export class SimulatedResponseSource implements ResponseSource {
  constructor(public readonly threshold: number) {}
  get(intensity: number) {
    return Promise.resolve(intensity >= this.threshold);
  }
}

export type KeyInput = NodeJS.ReadableStream & {
  isTTY?: boolean;
  readableEnded?: boolean;
  setRawMode?(mode: boolean): unknown;
};
/**
 * Single keypresses from a terminal. The terminal is switched to raw mode
 * until {@link KeypressResponseSource.close} is called.
 *
 * @example
 *
 * ```ts
 * const keys = new KeypressResponseSource();
 * try {
 *   const detected = await keys.get(intensity);
 * } finally {
 *   keys.close();
 * }
 * ```
 */
export class KeypressResponseSource implements ResponseSource {
  #raw = false;
  constructor(
    public readonly input: KeyInput = process.stdin,
    public readonly keys: { yes: string[]; no: string[] } = {
      yes: ['y', '1'],
      no: ['n', '0'],
    },
  ) {
    emitKeypressEvents(input);
    if (input.isTTY && input.setRawMode) {
      input.setRawMode(true);
      this.#raw = true;
    }
  }
  /**
   * Wait for the next yes or no key, other keys are ignored
   *
   * Rejects when the user presses ctrl+c or the input ends or fails.
   */
  get() {
    const { input } = this;
    return new Promise<boolean>((resolve, reject) => {
      if (input.readableEnded) {
        reject(new Error('The input ended before a response was given'));
        return;
      }
      const detach = () => {
        input.off('keypress', onKeypress);
        input.off('end', onEnd);
        input.off('close', onEnd);
        input.off('error', onError);
      };
      const onEnd = () => {
        detach();
        reject(new Error('The input ended before a response was given'));
      };
      const onError = (error: unknown) => {
        detach();
        reject(new Error('Cannot read the response', { cause: error }));
      };
      const onKeypress = (str: string | undefined, key: Key | undefined) => {
        // raw mode swallows SIGINT
        if (key?.ctrl && key.name === 'c') {
          detach();
          reject(new Error('Interrupted by the user'));
          return;
        }
        const name = key?.name ?? str;
        if (name === undefined) return;
        const yes = this.keys.yes.includes(name);
        if (!yes && !this.keys.no.includes(name)) return;
        detach();
        resolve(yes);
      };
      input.on('keypress', onKeypress);
      input.once('end', onEnd);
      input.once('close', onEnd);
      input.once('error', onError);
      input.resume();
    });
  }
  /** Release the terminal */
  close() {
    if (this.#raw && this.input.setRawMode) {
      this.input.setRawMode(false);
      this.#raw = false;
    }
    this.input.pause();
  }
}
