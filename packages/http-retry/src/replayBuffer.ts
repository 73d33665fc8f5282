import { ChainError, copyBody, isReplayable } from '@pipewright/http-middleware';
import type { RequestBody } from '@pipewright/http-middleware';

/**
 * Captures a request body once so every retry attempt can resend it byte for byte.
 *
 * The capture happens on first entry to the retrying middleware. Later mutations of the
 * request body by inner middleware do not affect what gets replayed.
 */
export class BodyReplayBuffer {
  private constructor(private readonly captured: RequestBody) {}

  static capture(body: RequestBody): BodyReplayBuffer {
    return new BodyReplayBuffer(copyBody(body) ?? body);
  }

  canReplay(): boolean {
    return isReplayable(this.captured);
  }

  replay(): RequestBody {
    const body = copyBody(this.captured);
    if (!body) {
      throw ChainError.replayUnsupported();
    }
    return body;
  }
}
