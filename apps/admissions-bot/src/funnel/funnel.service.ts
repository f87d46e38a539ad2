import { ConcurrentUpdateError } from '@admissions/shared-kernel';
import { createLogger } from '@admissions/observability';
import type { FunnelEvent, StaffStatusEvent } from '../domain/events';
import { todayIn } from '../domain/schedule';
import type { FunnelSettings } from '../domain/settings';
import type { TourRecord, UserRecord } from '../domain/types';
import type { ChatGateway, Reply } from '../chat/types';
import type { SyncDispatcher } from '../crm/sync-dispatcher';
import type { Translator } from '../i18n/translator';
import type { Store } from '../store/types';
import { KeyedMutex } from './keyed-mutex';
import { staffStatusUpdated } from './staff-notices';
import { transition } from './transition';
import type { FunnelEffect, TransitionResult } from './transition';

const log = createLogger('funnel');

const MAX_WRITE_ATTEMPTS = 3;

export interface FunnelServiceDeps {
  store: Store;
  chat: ChatGateway;
  dispatcher: SyncDispatcher;
  t: Translator;
  settings: FunnelSettings;
  clock?: () => Date;
}

/** Where a user event came from */
export interface UserOrigin {
  chatId: string;
  username: string | null;
  /** Message the pressed button sits on; replies in `replace` mode edit it */
  messageId: number | null;
}

export interface StaffOrigin {
  chatId: string;
  messageId: number | null;
  messageText: string | null;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class FunnelService {
  private readonly mutex = new KeyedMutex();
  private readonly clock: () => Date;

  constructor(private readonly deps: FunnelServiceDeps) {
    this.clock = deps.clock ?? (() => new Date());
  }

  /**
   * Runs one user event end to end: transition, persistence, replies,
   * staff notices and CRM commands. Events of the same chat never overlap.
   */
  async handle(origin: UserOrigin, event: FunnelEvent): Promise<void> {
    await this.mutex.runExclusive(origin.chatId, async () => {
      let result: TransitionResult;
      try {
        result = await this.applyWithRetry(origin, event);
      } catch (error) {
        log.error({ chatId: origin.chatId, event: event.type, error: errorMessage(error) }, 'Event not applied');
        return;
      }

      if (result.ignored) {
        log.debug({ chatId: origin.chatId, event: event.type, state: result.user.state }, 'Event ignored in current state');
        return;
      }

      await this.deliver(origin, result.replies);
      await this.runEffects(result.effects);
    });
  }

  /** Staff resolution of a tour, accepted only from the staff chat */
  async handleStaffStatus(origin: StaffOrigin, event: StaffStatusEvent): Promise<void> {
    const { staffChatId } = this.deps.settings;
    if (staffChatId === null || origin.chatId !== staffChatId) {
      log.warn({ chatId: origin.chatId, tourId: event.tourId }, 'Staff status from a foreign chat dropped');
      return;
    }

    let tour: TourRecord | null;
    try {
      tour = await this.deps.store.tours.transitionStatus(event.tourId, event.status);
    } catch (error) {
      log.error({ tourId: event.tourId, error: errorMessage(error) }, 'Tour status not updated');
      return;
    }
    if (!tour) {
      log.info({ tourId: event.tourId, status: event.status }, 'Tour missing or already resolved');
      return;
    }
    log.info({ tourId: tour.id, status: tour.status }, 'Tour status set by staff');

    if (origin.messageId !== null) {
      try {
        await this.deps.chat.edit(origin.chatId, origin.messageId, {
          text: staffStatusUpdated(event.status, origin.messageText),
        });
      } catch (error) {
        log.warn({ tourId: tour.id, error: errorMessage(error) }, 'Staff message not edited');
      }
    }
    this.deps.dispatcher.enqueue({ kind: 'update_lead', userId: tour.userId, fields: { tourStatus: tour.status } });
  }

  private async applyWithRetry(origin: UserOrigin, event: FunnelEvent): Promise<TransitionResult> {
    const { store, settings, t } = this.deps;

    for (let attempt = 1; ; attempt++) {
      const user =
        (await store.users.findById(origin.chatId)) ??
        (await store.users.createIfAbsent({
          id: origin.chatId,
          username: origin.username,
          language: settings.defaultLocale,
        }));
      const activeTour = event.type === 'reminder_response' ? await store.tours.findFirstBooked(user.id) : null;
      const now = this.clock();
      const result = transition(user, event, { t, settings, today: todayIn(settings.timezone, now), now, activeTour });
      if (result.ignored) return result;

      try {
        await this.persist(user, result);
        return result;
      } catch (error) {
        if (!(error instanceof ConcurrentUpdateError) || attempt >= MAX_WRITE_ATTEMPTS) throw error;
        log.warn({ chatId: origin.chatId, event: event.type, attempt }, 'Concurrent update, recomputing');
      }
    }
  }

  private async persist(before: UserRecord, result: TransitionResult): Promise<void> {
    const tourEffects = result.effects.filter(
      (effect) => effect.type === 'book_tour' || effect.type === 'set_tour_status',
    );
    if (result.user === before && tourEffects.length === 0) return;

    await this.deps.store.transaction(async (tx) => {
      if (result.user !== before) await tx.users.save(result.user);

      for (const effect of tourEffects) {
        if (effect.type === 'book_tour') {
          const superseded = await tx.tours.supersedeActive(effect.tour.userId);
          const tour = await tx.tours.create(effect.tour);
          log.info({ tourId: tour.id, userId: tour.userId, superseded }, 'Tour booked');
        } else if (effect.type === 'set_tour_status') {
          const tour = await tx.tours.transitionStatus(effect.tourId, effect.to, [effect.from]);
          if (!tour) throw new ConcurrentUpdateError('Tour', String(effect.tourId));
        }
      }
    });
  }

  private async deliver(origin: UserOrigin, replies: Reply[]): Promise<void> {
    const { chat } = this.deps;
    let editable = origin.messageId;

    for (const reply of replies) {
      const { keyboard } = reply;
      try {
        if (reply.mode === 'replace' && editable !== null && (keyboard === undefined || keyboard.kind === 'inline')) {
          await chat.edit(origin.chatId, editable, { text: reply.text, keyboard });
          editable = null;
        } else {
          await chat.send(origin.chatId, { text: reply.text, keyboard });
        }
      } catch (error) {
        log.error({ chatId: origin.chatId, error: errorMessage(error) }, 'Reply not delivered');
      }
    }
  }

  private async runEffects(effects: FunnelEffect[]): Promise<void> {
    const { chat, dispatcher, settings } = this.deps;

    for (const effect of effects) {
      if (effect.type === 'notify_staff') {
        if (settings.staffChatId === null) continue;
        try {
          await chat.send(settings.staffChatId, { text: effect.text });
        } catch (error) {
          log.error({ error: errorMessage(error) }, 'Staff notice not delivered');
        }
      } else if (effect.type === 'crm') {
        dispatcher.enqueue(effect.command);
      }
    }
  }
}
