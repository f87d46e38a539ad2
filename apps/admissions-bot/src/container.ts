import { createLogger } from '@admissions/observability';
import { AdminService } from './admin/admin.service';
import type { Env } from './config';
import { funnelSettings } from './config';
import { loadCrmFields } from './crm/crm-fields';
import { CrmWebhookService } from './crm/crm-webhook.service';
import { KommoClient } from './crm/kommo.client';
import { SyncDispatcher } from './crm/sync-dispatcher';
import { FileTokenStore } from './crm/token-store';
import type { CrmClient } from './crm/types';
import { FunnelService } from './funnel/funnel.service';
import { CatalogTranslator, loadCatalog } from './i18n/translator';
import { JobScheduler } from './jobs/scheduler';
import { TourJobs } from './jobs/tour-jobs';
import { createPgConnection } from './store/drizzle/client';
import { DrizzleStore } from './store/drizzle/drizzle.store';
import { MemoryStore } from './store/memory.store';
import type { Store } from './store/types';
import { TelegramPoller } from './telegram/poller';
import { TelegramClient } from './telegram/telegram.client';
import { UpdateRouter } from './telegram/update-router';

const log = createLogger('container');

export interface Container {
  store: Store;
  dispatcher: SyncDispatcher;
  poller: TelegramPoller;
  scheduler: JobScheduler;
  /** Null when no webhook secret is configured */
  crmWebhook: CrmWebhookService | null;
}

function createStore(env: Env): Store {
  if (env.STORE_DRIVER === 'memory' || !env.DATABASE_URL) {
    log.warn('Using the in-memory store; data is lost on restart');
    return new MemoryStore();
  }
  const { db, pool } = createPgConnection(env.DATABASE_URL);
  return new DrizzleStore(db, pool);
}

function createCrm(env: Env): CrmClient | null {
  if (!env.CRM_ENABLED) {
    log.info('CRM sync disabled');
    return null;
  }
  return new KommoClient({
    accountUrl: env.KOMMO_ACCOUNT_URL,
    accessToken: env.KOMMO_ACCESS_TOKEN,
    refreshToken: env.KOMMO_REFRESH_TOKEN,
    clientId: env.KOMMO_CLIENT_ID,
    clientSecret: env.KOMMO_CLIENT_SECRET,
    redirectUri: env.KOMMO_REDIRECT_URI,
    pipelineId: env.KOMMO_PIPELINE_ID,
    statusId: env.KOMMO_STATUS_ID,
    fields: loadCrmFields(),
    tokenStore: new FileTokenStore(env.KOMMO_TOKEN_CACHE),
  });
}

export function createContainer(env: Env): Container {
  const settings = funnelSettings(env);
  const t = new CatalogTranslator(loadCatalog(), settings.defaultLocale, { school: env.SCHOOL_NAME });
  const store = createStore(env);
  const telegram = new TelegramClient(env.TELEGRAM_BOT_TOKEN, env.TELEGRAM_API_URL);

  const dispatcher = new SyncDispatcher(createCrm(env), store.leadLinks, {
    maxAttempts: env.SYNC_MAX_ATTEMPTS,
    backoffMs: env.SYNC_BACKOFF_MS,
  });
  const funnel = new FunnelService({ store, chat: telegram, dispatcher, t, settings });
  const admin = new AdminService({ users: store.users, chat: telegram, adminIds: env.ADMIN_IDS });
  const router = new UpdateRouter({ chat: telegram, funnel, admin });
  const poller = new TelegramPoller(telegram, router, {
    enabled: env.TELEGRAM_POLLING_ENABLED,
    timeoutSeconds: env.TELEGRAM_POLL_TIMEOUT_S,
  });

  const jobs = new TourJobs({ tours: store.tours, chat: telegram, t, settings });
  const scheduler = new JobScheduler(
    jobs,
    { reminders: env.REMINDER_CRON, followups: env.FOLLOWUP_CRON, statusCheck: env.STATUS_CHECK_CRON },
    settings.timezone,
  );

  const secret = env.CRM_WEBHOOK_SECRET ?? (env.KOMMO_CLIENT_SECRET || null);
  const crmWebhook = secret
    ? new CrmWebhookService({ leadLinks: store.leadLinks, chat: telegram, secret, replyMarker: env.CRM_REPLY_MARKER })
    : null;

  return { store, dispatcher, poller, scheduler, crmWebhook };
}
