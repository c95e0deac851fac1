/**
 * Scripted sessions for supervisor tests.
 */

import type { DeviceIdentity } from '../models/identity';
import type {
  ChunkOutcome,
  NextChunkOptions,
  SessionHandle,
  SessionOpener,
  SessionOptions,
} from '../transport/session';
import { withAbort } from '../utils/abort';
import { never } from './fake-ble';

/**
 * Session that replays `outcomes`, then blocks until aborted.
 */
export class FakeSession implements SessionHandle {
  readonly peripheralName = 'OxySmart 500';
  readonly chunkOptions: NextChunkOptions[] = [];
  terminated = false;
  closeCalls = 0;

  constructor(private readonly outcomes: ChunkOutcome[] = []) {}

  nextChunk(options: NextChunkOptions = {}): Promise<ChunkOutcome> {
    this.chunkOptions.push(options);
    const next = this.outcomes.shift();
    if (next) {
      if (next.kind !== 'data') this.terminated = true;
      return Promise.resolve(next);
    }
    return withAbort(never<ChunkOutcome>(), options.signal);
  }

  async close(): Promise<void> {
    this.closeCalls++;
    this.terminated = true;
  }
}

/**
 * Opener that plays one step per attempt: throws errors, hands out sessions,
 * and blocks until aborted once the script runs out.
 */
export class ScriptedOpener {
  readonly calls: { identity: DeviceIdentity; options: SessionOptions }[] = [];

  constructor(private readonly steps: (Error | FakeSession)[]) {}

  readonly open: SessionOpener = async (identity, options) => {
    this.calls.push({ identity, options });
    const step = this.steps.shift();
    if (!step) {
      return withAbort(never<SessionHandle>(), options.signal);
    }
    options.onStage?.('connecting');
    if (step instanceof Error) {
      throw step;
    }
    options.onStage?.('subscribing');
    return step;
  };
}
