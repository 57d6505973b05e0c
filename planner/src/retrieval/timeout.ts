import { ProviderUnavailableError, errorMessage } from "../errors.js";

/**
 * Run a provider call under a deadline. Any failure, including the deadline,
 * comes back as ProviderUnavailableError.
 */
export async function withProviderTimeout<T>(
  label: string,
  timeoutMs: number,
  call: () => Promise<T>
): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      reject(new ProviderUnavailableError(`${label} timed out after ${timeoutMs}ms`));
    }, timeoutMs);
  });

  try {
    return await Promise.race([call(), deadline]);
  } catch (err: unknown) {
    if (err instanceof ProviderUnavailableError) throw err;
    throw new ProviderUnavailableError(`${label} failed: ${errorMessage(err)}`, { cause: err });
  } finally {
    clearTimeout(timer);
  }
}
