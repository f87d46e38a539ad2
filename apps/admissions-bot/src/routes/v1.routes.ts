import express, { Router } from 'express';
import type { Router as ExpressRouter } from 'express';
import { crmWebhookController } from '../controllers/crm-webhook.controller';
import type { CrmWebhookService } from '../crm/crm-webhook.service';

export function createV1Router(crmWebhook: CrmWebhookService | null): ExpressRouter {
  const router: ExpressRouter = Router();
  const controller = crmWebhookController(crmWebhook);

  // Raw text body: the signature covers the exact bytes sent
  router.post('/crm/webhook', express.text({ type: 'application/x-www-form-urlencoded' }), controller.receive);

  return router;
}
