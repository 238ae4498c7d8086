import { errorMessage } from './errors';

/**
 * Outcome of a computation the pipeline can live without
 * (global summary, title, key facts).
 */
export type BestEffort<T> =
  | { success: true; value: T }
  | { success: false; error: string };

export async function attempt<T>(fn: () => Promise<T>): Promise<BestEffort<T>> {
  try {
    return { success: true, value: await fn() };
  } catch (error) {
    return { success: false, error: errorMessage(error) };
  }
}

export function valueOrUndefined<T>(result: BestEffort<T>): T | undefined {
  return result.success ? result.value : undefined;
}
