import * as pingModule from 'ping';
import { getErrorMessage, withTimeout } from '../errors';
import type { ProbeOutcome } from '../types';

interface PingOptions {
  /** Milliseconds the whole call may take, process start to result. */
  timeout?: number;
}

function lastLine(output: string): string {
  const lines = output.trim().split(/\r?\n/);
  return lines[lines.length - 1].trim();
}

export async function ping(host: string, options: PingOptions = {}): Promise<ProbeOutcome> {
  const timeout = options.timeout || 5000;
  // ping(8) only takes whole seconds. Below one second the hard timeout below
  // gives up first and the child exits on its own deadline shortly after.
  const seconds = Math.max(1, Math.floor(timeout / 1000));

  try {
    const result = await withTimeout(
      pingModule.promise.probe(host, {
        timeout: seconds,
        deadline: seconds,
        min_reply: 1
      }),
      timeout
    );

    if (result.alive) {
      return { status: 'reachable' };
    }

    if (!result.output || !result.output.trim()) {
      return { status: 'error', error: 'ping produced no output' };
    }

    return { status: 'unreachable', reason: lastLine(result.output) || 'No reply' };
  } catch (error) {
    return { status: 'error', error: getErrorMessage(error) };
  }
}
