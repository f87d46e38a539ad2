import type { NextFunction, Request, Response } from 'express';
import { ok } from '@admissions/shared-kernel';
import { createLogger } from '@admissions/observability';
import type { CrmWebhookService } from '../crm/crm-webhook.service';

const log = createLogger('crm-webhook-controller');

export function crmWebhookController(service: CrmWebhookService | null) {
  return {
    // The CRM retries on anything but 200, so every payload gets the same answer
    async receive(req: Request, res: Response, next: NextFunction) {
      try {
        if (!service) {
          log.warn('CRM webhook received but no secret is configured');
        } else {
          const rawBody: string = typeof req.body === 'string' ? req.body : '';
          const forwarded = await service.handle(rawBody, req.get('x-signature'));
          if (forwarded > 0) log.info({ forwarded }, 'CRM replies forwarded');
        }
        res.json(ok({ received: true }));
      } catch (err) {
        next(err);
      }
    },
  };
}
