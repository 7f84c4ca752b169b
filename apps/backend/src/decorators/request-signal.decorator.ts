import { createParamDecorator, ExecutionContext } from '@nestjs/common';
import { Response } from 'express';

/**
 * AbortSignal that fires when the client goes away before the response has
 * been written. Usage: @RequestSignal() signal: AbortSignal
 */
export const RequestSignal = createParamDecorator(
  (data: unknown, ctx: ExecutionContext): AbortSignal => {
    const response = ctx.switchToHttp().getResponse<Response>();
    const controller = new AbortController();

    response.once('close', () => {
      if (!response.writableEnded) {
        controller.abort();
      }
    });

    return controller.signal;
  },
);
