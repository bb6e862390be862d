/**
 * Shared test helpers
 */

type ErrorClass<T> = abstract new (...args: never[]) => T;

/**
 * Run `fn` and return what it threw, narrowed to `type`
 */
export function captureError<T>(fn: () => unknown, type: ErrorClass<T>): T {
  try {
    fn();
  } catch (error) {
    if (error instanceof type) {
      return error;
    }
    throw error;
  }
  throw new Error('Expected the call to throw');
}

export async function captureRejection<T>(promise: Promise<unknown>, type: ErrorClass<T>): Promise<T> {
  try {
    await promise;
  } catch (error) {
    if (error instanceof type) {
      return error;
    }
    throw error;
  }
  throw new Error('Expected the promise to reject');
}
