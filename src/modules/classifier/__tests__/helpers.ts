import { fileURLToPath } from 'url';
import { ModelConfig } from '../config/model.config.js';

export const FIXTURE_CONFIG_PATH = fileURLToPath(new URL('./fixtures/models.json', import.meta.url));

export function fixtureConfig(): ModelConfig {
  return ModelConfig.fromFile(FIXTURE_CONFIG_PATH);
}

export function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error('expected function to throw');
}

export async function captureRejection(p: Promise<unknown>): Promise<unknown> {
  try {
    await p;
  } catch (err) {
    return err;
  }
  throw new Error('expected promise to reject');
}

/** Promise with its resolvers exposed. */
export function deferred<T>() {
  let resolve: (value: T) => void = () => {};
  let reject: (reason: unknown) => void = () => {};
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}
