/**
 * Echo use case.
 * Returns its payload unchanged. Used by the entry point and as the
 * reference use case in tests.
 */

import type { RequestContext } from '../context.js';
import type { IUseCase } from '../handler/IUseCase.js';
import type { DispatchRequest, HandlerResult } from '../types/models.js';

export class EchoUseCase implements IUseCase {
  readonly name = 'echo';

  async process(_ctx: RequestContext, req: DispatchRequest): Promise<HandlerResult> {
    return {
      response: {
        id: req.id,
        success: true,
        data: req.payload,
        metadata: {},
        processedAt: new Date(),
      },
    };
  }

  async health(): Promise<void> {
    // No dependencies to check.
  }
}
