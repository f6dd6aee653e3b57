import { Request, Response, NextFunction } from 'express';
import { getServices } from '../services';

export class WebhookController {
  /**
   * Provider payment notification
   * POST /webhooks/:provider
   *
   * The body arrives unparsed; signatures are computed over the exact bytes.
   * The status code is the provider's retry signal: 2xx stops retries, 5xx
   * asks for a redelivery.
   */
  receive = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const rawBody: Buffer = Buffer.isBuffer(req.body) ? req.body : Buffer.alloc(0);
      const result = await getServices().ingress.ingest(req.params.provider, rawBody, req.headers);

      res.status(result.httpStatus).json({
        success: result.httpStatus === 200,
        outcome: result.outcome,
        eventId: result.eventId,
      });
    } catch (error) {
      next(error);
    }
  };
}

export const webhookController = new WebhookController();
