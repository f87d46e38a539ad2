import { createLogger } from '@admissions/observability';
import type { ChatGateway } from '../chat/types';
import type { AdminCommand } from '../domain/events';
import type { UserRepository } from '../store/types';
import type { ChatInfo } from '../telegram/updates';

const log = createLogger('admin');

export interface AdminServiceDeps {
  users: UserRepository;
  chat: ChatGateway;
  adminIds: readonly string[];
  progressEvery?: number;
}

export interface BroadcastReport {
  recipients: number;
  sent: number;
  failed: number;
}

export class AdminService {
  private readonly progressEvery: number;

  constructor(private readonly deps: AdminServiceDeps) {
    this.progressEvery = deps.progressEvery ?? 50;
  }

  isAdmin(chatId: string): boolean {
    return this.deps.adminIds.includes(chatId);
  }

  async handle(chat: ChatInfo, command: AdminCommand): Promise<void> {
    switch (command.type) {
      case 'getid':
        await this.reply(chat.id, `🆔 Chat Info:\n\nID: ${chat.id}\nType: ${chat.type}\nTitle: ${chat.title ?? 'Private'}`);
        return;

      case 'stats':
        if (!this.isAdmin(chat.id)) return;
        await this.reply(chat.id, `Total users: ${await this.deps.users.count()}`);
        return;

      case 'broadcast':
        if (!this.isAdmin(chat.id)) return;
        if (command.text.trim().length === 0) {
          await this.reply(chat.id, 'Usage: /broadcast <message>');
          return;
        }
        await this.broadcast(chat.id, command.text.trim());
        return;
    }
  }

  /** Sends `text` to every known user; one failed recipient never stops the run */
  async broadcast(adminChatId: string, text: string): Promise<BroadcastReport> {
    const { chat, users } = this.deps;
    const recipients = await users.listIds();
    const report: BroadcastReport = { recipients: recipients.length, sent: 0, failed: 0 };
    log.info({ recipients: recipients.length }, 'Broadcast started');

    const statusId = await chat.send(adminChatId, { text: `🚀 Starting broadcast to ${recipients.length} users...` });

    for (const recipient of recipients) {
      try {
        await chat.send(recipient, { text });
        report.sent += 1;
      } catch (error) {
        report.failed += 1;
        log.warn({ recipient, error: error instanceof Error ? error.message : String(error) }, 'Broadcast message not delivered');
      }
      if ((report.sent + report.failed) % this.progressEvery === 0) {
        await this.editStatus(adminChatId, statusId, `🚀 Sending... ${report.sent} sent, ${report.failed} failed`);
      }
    }

    await this.editStatus(adminChatId, statusId, `✅ Broadcast complete.\nSent: ${report.sent}\nFailed: ${report.failed}`);
    log.info(report, 'Broadcast finished');
    return report;
  }

  private async reply(chatId: string, text: string): Promise<void> {
    await this.deps.chat.send(chatId, { text });
  }

  private async editStatus(chatId: string, messageId: number, text: string): Promise<void> {
    try {
      await this.deps.chat.edit(chatId, messageId, { text });
    } catch (error) {
      log.warn({ chatId, error: error instanceof Error ? error.message : String(error) }, 'Broadcast status not updated');
    }
  }
}
