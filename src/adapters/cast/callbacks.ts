type NodeCallback<T> = (error: Error | null, result: T) => void;

/**
 * Adapts one castv2-client call taking a trailing `(err, result)` callback
 * into a promise.
 */
export function fromCallback<T>(call: (callback: NodeCallback<T>) => void): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    try {
      call((error, result) => {
        if (error) {
          reject(error);
          return;
        }
        resolve(result);
      });
    } catch (error) {
      reject(error instanceof Error ? error : new Error(String(error)));
    }
  });
}
