import { ProviderUnavailableError, SearchCancelledError, errorMessage } from '../errors.js';
import type { LocationProvider, ProviderErrors, ProviderName, ProviderQuery } from '../types.js';

// Settles with the work, or rejects as soon as the signal aborts, whichever comes
// first. A source that ignores its signal cannot hold the search open.
function raceAbort<T>(work: Promise<T>, signal: AbortSignal): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(signal.reason);
    void work.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (err: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(err);
      }
    );
    if (signal.aborted) {
      onAbort();
      return;
    }
    signal.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Runs one call against an external source, bounded by the caller's signal and
 * its own deadline. Caller cancellation surfaces as SearchCancelledError; an
 * expired deadline as ProviderUnavailableError.
 */
export async function runWithDeadline<T>(
  source: string,
  task: (signal: AbortSignal) => Promise<T>,
  callerSignal: AbortSignal,
  timeoutMs: number
): Promise<T> {
  if (callerSignal.aborted) throw new SearchCancelledError();
  const signal = AbortSignal.any([callerSignal, AbortSignal.timeout(timeoutMs)]);

  try {
    return await raceAbort(task(signal), signal);
  } catch (err) {
    if (callerSignal.aborted) throw new SearchCancelledError();
    if (signal.aborted) throw new ProviderUnavailableError(source, `${source} timed out after ${timeoutMs} ms`);
    throw err;
  }
}

export interface ProviderRecords {
  provider: ProviderName;
  records: unknown[];
}

export interface CollectedRecords {
  batches: ProviderRecords[];
  providerErrors: ProviderErrors;
}

/**
 * Queries every provider concurrently. A failing or slow provider is reported
 * in providerErrors and does not affect the others.
 */
export async function collectFromProviders(
  providers: readonly LocationProvider[],
  query: ProviderQuery,
  callerSignal: AbortSignal,
  timeoutMs: number
): Promise<CollectedRecords> {
  const outcomes = await Promise.all(
    providers.map(async (provider): Promise<ProviderRecords | { provider: ProviderName; reason: string }> => {
      try {
        const records = await runWithDeadline(provider.name, (signal) => provider.search(query, signal), callerSignal, timeoutMs);
        return { provider: provider.name, records };
      } catch (err) {
        if (err instanceof SearchCancelledError) throw err;
        const reason = errorMessage(err);
        console.warn(`[providers] ${provider.name} failed`, { provider: provider.name, reason });
        return { provider: provider.name, reason };
      }
    })
  );

  const batches: ProviderRecords[] = [];
  const providerErrors: ProviderErrors = {};
  for (const outcome of outcomes) {
    if ('records' in outcome) {
      batches.push(outcome);
    } else {
      providerErrors[outcome.provider] = outcome.reason;
    }
  }

  return { batches, providerErrors };
}
