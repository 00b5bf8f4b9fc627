import type { AggregatedResult } from './taskTypes.js';

/**
 * Render an aggregate as the assistant's reply: one line per successful
 * handler, then what went wrong, if anything.
 */
export function formatResponse(result: AggregatedResult): string {
  if (result.status === 'failed') {
    return result.error?.message ?? 'I could not complete that request.';
  }

  const lines = result.results.flatMap((outcome) =>
    outcome.status === 'ok' && outcome.result ? [outcome.result.summary] : []
  );

  const failure = result.results.find((outcome) => outcome.status === 'error')?.error;
  if (failure) {
    lines.push(failure.message);
  }

  if (result.degraded.length > 0) {
    lines.push(`Some details are missing because ${result.degraded.join(', ')} took too long to answer.`);
  }

  return lines.length > 0 ? lines.join('\n') : 'I could not complete that request.';
}
