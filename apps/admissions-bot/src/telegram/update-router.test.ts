import { describe, expect, it } from 'vitest';
import { AdminService } from '../admin/admin.service';
import { SyncDispatcher } from '../crm/sync-dispatcher';
import { FunnelService } from '../funnel/funnel.service';
import { MemoryStore } from '../store/memory.store';
import { FakeChatGateway } from '../testing/fakes';
import { TEST_NOW, testSettings, testTranslator } from '../testing/fixtures';
import { UpdateRouter } from './update-router';
import { decodeUpdate } from './updates';
import type { InboundUpdate } from './updates';

function setup() {
  const store = new MemoryStore();
  const chat = new FakeChatGateway();
  const dispatcher = new SyncDispatcher(null, store.leadLinks, { maxAttempts: 1, backoffMs: 1 });
  const funnel = new FunnelService({ store, chat, dispatcher, t: testTranslator, settings: testSettings, clock: () => TEST_NOW });
  const admin = new AdminService({ users: store.users, chat, adminIds: [] });
  return { store, chat, router: new UpdateRouter({ chat, funnel, admin }) };
}

function decoded(raw: unknown): InboundUpdate {
  const update = decodeUpdate(raw);
  if (!update) throw new Error('fixture did not decode');
  return update;
}

describe('UpdateRouter', () => {
  it('answers the callback and runs the funnel event', async () => {
    const { store, chat, router } = setup();
    await router.route(
      decoded({
        update_id: 1,
        callback_query: {
          id: 'cb-1',
          from: { id: 1001, username: 'parent' },
          data: 'lang_en',
          message: { message_id: 42, chat: { id: 1001, type: 'private' }, text: 'Choose a language' },
        },
      }),
    );

    expect(chat.answered).toEqual(['cb-1']);
    expect((await store.users.findById('1001'))?.state).toBe('awaiting_name');
    expect(chat.edits.map(({ messageId }) => messageId)).toEqual([42]);
  });

  it('keeps funnel input from group chats out of the funnel', async () => {
    const { store, router } = setup();
    await router.route(
      decoded({ update_id: 2, message: { message_id: 5, chat: { id: -100200, type: 'supergroup' }, text: 'hello' } }),
    );
    expect(await store.users.count()).toBe(0);
  });

  it('sends staff buttons to the staff handler', async () => {
    const { store, router } = setup();
    const tour = await store.tours.create({
      userId: '1001',
      phone: '+998901234567',
      campus: 'mu',
      date: '2026-10-17',
      time: '10:00',
      language: 'en',
    });

    await router.route(
      decoded({
        update_id: 3,
        callback_query: {
          id: 'cb-2',
          from: { id: 77 },
          data: `admin_status_${tour.id}_noshow`,
          message: { message_id: 9, chat: { id: -100200, type: 'supergroup' }, text: '📋 Tour Status Check' },
        },
      }),
    );

    expect((await store.tours.findById(tour.id))?.status).toBe('no_show');
  });

  it('runs admin commands in any chat', async () => {
    const { chat, router } = setup();
    await router.route(
      decoded({ update_id: 4, message: { message_id: 6, chat: { id: -100200, type: 'group', title: 'Staff' }, text: '/getid' } }),
    );
    expect(chat.textsTo('-100200')).toEqual(['🆔 Chat Info:\n\nID: -100200\nType: group\nTitle: Staff']);
  });
});
