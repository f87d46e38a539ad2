import { createLogger } from '@admissions/observability';
import type { LeadLinkRepository } from '../store/types';
import type { CrmClient, CrmCommand } from './types';

const log = createLogger('crm-sync');

type Outcome = 'done' | 'retry' | 'skipped';

export interface SyncDispatcherOptions {
  maxAttempts: number;
  backoffMs: number;
  sleep?: (ms: number) => Promise<void>;
}

const wait = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/**
 * Runs CRM commands one at a time, off the conversation path.
 * Failed commands are retried with exponential backoff and then dropped with an error log;
 * nothing here ever rejects back to the caller.
 */
export class SyncDispatcher {
  private chain: Promise<void> = Promise.resolve();
  private inFlight = 0;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(
    private readonly crm: CrmClient | null,
    private readonly links: LeadLinkRepository,
    private readonly options: SyncDispatcherOptions,
  ) {
    this.sleep = options.sleep ?? wait;
  }

  /** Commands queued or running */
  get pending(): number {
    return this.inFlight;
  }

  enqueue(command: CrmCommand): void {
    if (!this.crm) {
      log.debug({ kind: command.kind, userId: command.userId }, 'CRM disabled, command dropped');
      return;
    }
    this.inFlight += 1;
    this.chain = this.chain
      .then(() => this.run(command))
      .finally(() => {
        this.inFlight -= 1;
      });
  }

  /** Resolves once every command queued so far has settled */
  drain(): Promise<void> {
    return this.chain;
  }

  private async run(command: CrmCommand): Promise<void> {
    const { maxAttempts, backoffMs } = this.options;
    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      let outcome: Outcome;
      try {
        outcome = await this.execute(command);
      } catch (error) {
        log.warn(
          { kind: command.kind, userId: command.userId, attempt, error: error instanceof Error ? error.message : String(error) },
          'CRM command threw',
        );
        outcome = 'retry';
      }
      if (outcome !== 'retry') return;
      if (attempt < maxAttempts) await this.sleep(backoffMs * 2 ** (attempt - 1));
    }
    log.error({ kind: command.kind, userId: command.userId, attempts: maxAttempts }, 'CRM command failed');
  }

  private async execute(command: CrmCommand): Promise<Outcome> {
    const crm = this.crm;
    if (!crm) return 'skipped';

    switch (command.kind) {
      case 'upsert_contact': {
        const contactId = await crm.upsertContact(command.phone, command.profile);
        return contactId === null ? 'retry' : 'done';
      }

      case 'create_lead': {
        const existing = await this.links.findByUser(command.userId);
        if (existing) {
          return (await crm.updateLead(existing.leadId, command.lead)) ? 'done' : 'retry';
        }
        const contactId = await crm.upsertContact(command.phone, command.profile);
        const leadId = await crm.createLead(contactId, command.phone, command.lead);
        if (leadId === null) return 'retry';
        log.info({ userId: command.userId, leadId }, 'Lead created');
        // The lead exists now; running the command again would create a second one
        try {
          await this.links.save({ userId: command.userId, contactId, leadId });
        } catch (error) {
          log.error(
            { userId: command.userId, leadId, error: error instanceof Error ? error.message : String(error) },
            'Lead created but link not saved',
          );
        }
        return 'done';
      }

      case 'update_lead':
      case 'add_note':
      case 'create_task': {
        const link = await this.links.findByUser(command.userId);
        if (!link) {
          log.warn({ kind: command.kind, userId: command.userId }, 'No lead linked, command skipped');
          return 'skipped';
        }
        const ok =
          command.kind === 'update_lead'
            ? await crm.updateLead(link.leadId, command.fields)
            : command.kind === 'add_note'
              ? await crm.addNote(link.leadId, command.text)
              : await crm.createTask(link.leadId, command.text, command.dueAt);
        return ok ? 'done' : 'retry';
      }
    }
  }
}
