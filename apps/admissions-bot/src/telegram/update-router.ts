import { createLogger } from '@admissions/observability';
import type { AdminService } from '../admin/admin.service';
import type { ChatGateway } from '../chat/types';
import type { FunnelService } from '../funnel/funnel.service';
import type { InboundUpdate } from './updates';

const log = createLogger('update-router');

export interface UpdateRouterDeps {
  chat: ChatGateway;
  funnel: FunnelService;
  admin: AdminService;
}

/** Dispatches decoded updates to the funnel, staff and admin handlers */
export class UpdateRouter {
  constructor(private readonly deps: UpdateRouterDeps) {}

  async route(update: InboundUpdate): Promise<void> {
    const { chat, funnel, admin } = this.deps;

    // Telegram keeps the button spinning until the query is answered
    if (update.callbackQueryId) {
      try {
        await chat.answerCallback(update.callbackQueryId);
      } catch (error) {
        log.warn({ updateId: update.updateId, error: error instanceof Error ? error.message : String(error) }, 'Callback not answered');
      }
    }

    const { action } = update;
    if (!action) {
      log.debug({ updateId: update.updateId, chatId: update.chat.id }, 'Update without action');
      return;
    }

    switch (action.kind) {
      case 'funnel':
        if (update.chat.type !== 'private') {
          log.debug({ updateId: update.updateId, chatId: update.chat.id }, 'Funnel input outside a private chat');
          return;
        }
        await funnel.handle(
          { chatId: update.chat.id, username: update.username, messageId: update.messageId },
          action.event,
        );
        return;

      case 'staff_status':
        await funnel.handleStaffStatus(
          { chatId: update.chat.id, messageId: update.messageId, messageText: update.messageText },
          action.event,
        );
        return;

      case 'admin':
        await admin.handle(update.chat, action.command);
        return;
    }
  }
}
