/**
 * Composable processing stages.
 * A stage is a plain function; a pipeline is an ordered list of stages.
 */

export type Processor<T> = (input: T) => T;

export type AsyncProcessor<T> = (input: T) => T | Promise<T>;

/**
 * Run synchronous stages left to right.
 */
export function composeProcessors<T>(processors: readonly Processor<T>[]): Processor<T> {
  return (input: T) => processors.reduce((value, processor) => processor(value), input);
}

/**
 * Run stages left to right, awaiting each one.
 */
export function composeAsyncProcessors<T>(
  processors: readonly AsyncProcessor<T>[]
): (input: T) => Promise<T> {
  return async (input: T) => {
    let value = input;
    for (const processor of processors) {
      value = await processor(value);
    }
    return value;
  };
}
