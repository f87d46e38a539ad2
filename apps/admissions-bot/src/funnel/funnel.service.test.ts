import { describe, expect, it } from 'vitest';
import type { FunnelState } from '@admissions/shared-kernel';
import { SyncDispatcher } from '../crm/sync-dispatcher';
import type { FunnelEvent } from '../domain/events';
import type { FunnelAnswers, UserRecord } from '../domain/types';
import { MemoryStore } from '../store/memory.store';
import type { Repositories } from '../store/types';
import { FakeChatGateway, FakeCrmClient } from '../testing/fakes';
import { TEST_NOW, testSettings, testTranslator } from '../testing/fixtures';
import { FunnelService } from './funnel.service';
import type { UserOrigin } from './funnel.service';

const STAFF_CHAT = '-100200';
const textOrigin: UserOrigin = { chatId: '1001', username: 'parent', messageId: null };
const buttonOrigin: UserOrigin = { chatId: '1001', username: 'parent', messageId: 10 };

function setup(store: MemoryStore = new MemoryStore()) {
  const chat = new FakeChatGateway();
  const crm = new FakeCrmClient();
  const dispatcher = new SyncDispatcher(crm, store.leadLinks, { maxAttempts: 3, backoffMs: 500, sleep: async () => undefined });
  const service = new FunnelService({
    store,
    chat,
    dispatcher,
    t: testTranslator,
    settings: testSettings,
    clock: () => TEST_NOW,
  });
  return { store, chat, crm, dispatcher, service };
}

async function seed(store: MemoryStore, state: FunnelState, answers: Partial<FunnelAnswers> = {}): Promise<UserRecord> {
  const created = await store.users.createIfAbsent({ id: '1001', username: 'parent', language: 'en' });
  return store.users.save({ ...created, state, answers: { ...created.answers, ...answers } });
}

async function stored(store: MemoryStore): Promise<UserRecord> {
  const user = await store.users.findById('1001');
  if (!user) throw new Error('user 1001 missing');
  return user;
}

const newTour = { userId: '1001', phone: '+998901234567', campus: 'mu', date: '2026-10-19', time: '14:00', language: 'en' as const };

describe('FunnelService: qualification', () => {
  it('walks the whole funnel and creates one lead', async () => {
    const { store, chat, crm, dispatcher, service } = setup();
    const events: [UserOrigin, FunnelEvent][] = [
      [textOrigin, { type: 'restart' }],
      [buttonOrigin, { type: 'language', locale: 'en' }],
      [textOrigin, { type: 'text', text: 'Jane Doe' }],
      [textOrigin, { type: 'text', text: '901234567' }],
      [buttonOrigin, { type: 'children_count', count: 2 }],
      [buttonOrigin, { type: 'child_age', age: '3-6' }],
      [buttonOrigin, { type: 'child_age', age: '7-10' }],
      [buttonOrigin, { type: 'program', program: 'ib' }],
      [buttonOrigin, { type: 'enrollment', enrollment: 'next_year' }],
    ];
    for (const [origin, event] of events) await service.handle(origin, event);
    await dispatcher.drain();

    const user = await stored(store);
    expect(user.state).toBe('ready');
    expect(user.language).toBe('en');
    expect(user.answers).toMatchObject({
      name: 'Jane Doe',
      phone: '+998901234567',
      childrenCount: 2,
      childrenAges: ['3-6', '7-10'],
      program: 'ib',
      enrollment: 'next_year',
    });
    expect(crm.methods()).toEqual(['upsertContact', 'upsertContact', 'createLead']);
    expect(await store.leadLinks.findByUser('1001')).toMatchObject({ contactId: 7001, leadId: 9000 });
    expect(chat.textsTo(STAFF_CHAT).map((text) => text.split('\n')[0])).toEqual(['🆕 New Lead from Telegram Bot']);
  });

  it('still finishes and notifies staff when the lead cannot be created', async () => {
    const { store, chat, crm, dispatcher, service } = setup();
    crm.failures.set('createLead', 3);
    await seed(store, 'awaiting_enrollment', {
      name: 'Jane Doe',
      phone: '+998901234567',
      childrenCount: 1,
      childrenAges: ['3-6'],
      program: 'ib',
    });

    await service.handle(buttonOrigin, { type: 'enrollment', enrollment: 'next_year' });
    await dispatcher.drain();

    expect((await stored(store)).state).toBe('ready');
    expect(chat.textsTo(STAFF_CHAT)).toHaveLength(1);
    expect(crm.methods().filter((method) => method === 'createLead')).toHaveLength(3);
    expect(await store.leadLinks.findByUser('1001')).toBeNull();
  });

  it('creates the user lazily on first contact', async () => {
    const { store, chat, service } = setup();
    await service.handle(textOrigin, { type: 'restart' });

    const user = await stored(store);
    expect(user.language).toBe('ru');
    expect(user.username).toBe('parent');
    expect(chat.sent).toHaveLength(1);
    expect(chat.sent[0].keyboard?.kind).toBe('inline');
  });

  it('edits the pressed message for replace replies', async () => {
    const { chat, service } = setup();
    await service.handle(buttonOrigin, { type: 'language', locale: 'en' });

    expect(chat.sent).toEqual([]);
    expect(chat.edits).toEqual([{ chatId: '1001', messageId: 10, text: 'Please enter your Name and Surname:' }]);
  });

  it('leaves an out-of-state event without a trace', async () => {
    const { store, chat, dispatcher, crm, service } = setup();
    const before = await seed(store, 'awaiting_name');

    await service.handle(buttonOrigin, { type: 'program', program: 'ib' });
    await dispatcher.drain();

    expect(await stored(store)).toEqual(before);
    expect(chat.sent).toEqual([]);
    expect(chat.edits).toEqual([]);
    expect(crm.calls).toEqual([]);
  });

  it('keeps going when a reply cannot be delivered', async () => {
    const { store, chat, service } = setup();
    await seed(store, 'awaiting_name');
    chat.failFor.add('1001');

    await service.handle(textOrigin, { type: 'text', text: 'Jane Doe' });

    expect((await stored(store)).state).toBe('awaiting_phone');
  });
});

describe('FunnelService: persistence', () => {
  it('serializes concurrent events of one user', async () => {
    const { store, service } = setup();
    await seed(store, 'awaiting_child_age', { childrenCount: 2, currentChild: 1, childrenAges: [] });

    await Promise.all([
      service.handle(buttonOrigin, { type: 'child_age', age: '3-6' }),
      service.handle(buttonOrigin, { type: 'child_age', age: '7-10' }),
    ]);

    const user = await stored(store);
    expect(user.state).toBe('awaiting_program');
    expect(user.answers.childrenAges).toEqual(['3-6', '7-10']);
  });

  it('recomputes the transition after a concurrent write', async () => {
    class InterferingStore extends MemoryStore {
      interfered = false;

      async transaction<T>(work: (tx: Repositories) => Promise<T>): Promise<T> {
        if (!this.interfered) {
          this.interfered = true;
          const fresh = await this.users.findById('1001');
          if (fresh) await this.users.save({ ...fresh, language: 'uz' });
        }
        return super.transaction(work);
      }
    }
    const store = new InterferingStore();
    const { chat, service } = setup(store);
    await seed(store, 'awaiting_name');

    await service.handle(textOrigin, { type: 'text', text: 'Jane Doe' });

    const user = await stored(store);
    expect(user.state).toBe('awaiting_phone');
    expect(user.language).toBe('uz');
    expect(user.answers.name).toBe('Jane Doe');
    expect(user.version).toBe(3);
    expect(chat.sent).toHaveLength(1);
  });

  it('emits nothing when the store fails', async () => {
    class FailingStore extends MemoryStore {
      async transaction<T>(): Promise<T> {
        throw new Error('connection lost');
      }
    }
    const store = new FailingStore();
    const { chat, crm, dispatcher, service } = setup(store);
    await seed(store, 'awaiting_phone', { name: 'Jane Doe' });

    await service.handle(textOrigin, { type: 'text', text: '901234567' });
    await dispatcher.drain();

    const user = await stored(store);
    expect(user.state).toBe('awaiting_phone');
    expect(user.answers.phone).toBeNull();
    expect(chat.sent).toEqual([]);
    expect(crm.calls).toEqual([]);
  });
});

describe('FunnelService: tours', () => {
  async function book(service: FunnelService, campus: string, date: string, time: string) {
    await service.handle(buttonOrigin, { type: 'menu_action', action: 'book_tour' });
    await service.handle(buttonOrigin, { type: 'campus', campus });
    await service.handle(buttonOrigin, { type: 'tour_date', date });
    await service.handle(buttonOrigin, { type: 'tour_time', time });
  }

  it('books a tour and supersedes the previous one', async () => {
    const { store, chat, service } = setup();
    await seed(store, 'ready', { name: 'Jane Doe', phone: '+998901234567' });

    await book(service, 'mu', '2026-10-19', '14:00');
    await book(service, 'yashnobod', '2026-10-21', '10:00');

    const tours = await store.tours.findByUser('1001');
    expect(tours.map(({ id, campus, date, time, status }) => ({ id, campus, date, time, status }))).toEqual([
      { id: 1, campus: 'mu', date: '2026-10-19', time: '14:00', status: 'rescheduled' },
      { id: 2, campus: 'yashnobod', date: '2026-10-21', time: '10:00', status: 'booked' },
    ]);
    expect((await stored(store)).state).toBe('ready');
    expect(chat.textsTo(STAFF_CHAT)).toHaveLength(2);
  });

  it('confirms the booked tour from a reminder button', async () => {
    const { store, chat, crm, dispatcher, service } = setup();
    await seed(store, 'ready', { phone: '+998901234567' });
    await store.tours.create(newTour);
    await store.leadLinks.save({ userId: '1001', contactId: 7, leadId: 42 });

    await service.handle(buttonOrigin, { type: 'reminder_response', action: 'confirm' });
    await dispatcher.drain();

    expect((await store.tours.findById(1))?.status).toBe('confirmed');
    expect(chat.edits).toEqual([{ chatId: '1001', messageId: 10, text: '✅ Will attend' }]);
    expect(crm.calls).toEqual([{ method: 'updateLead', leadId: 42, fields: { tourStatus: 'confirmed' } }]);
  });

  it('cancels on a reschedule request and tells staff', async () => {
    const { store, chat, service } = setup();
    await seed(store, 'ready', { phone: '+998901234567' });
    await store.tours.create(newTour);

    await service.handle(buttonOrigin, { type: 'reminder_response', action: 'reschedule' });

    expect((await store.tours.findById(1))?.status).toBe('cancelled');
    expect(chat.edits[0].text).toBe('Understood. Our manager will contact you to choose another time.');
    expect(chat.textsTo(STAFF_CHAT)).toHaveLength(1);
  });

  it('answers "not found" when no tour is booked', async () => {
    const { store, chat, service } = setup();
    await seed(store, 'ready');

    await service.handle(buttonOrigin, { type: 'reminder_response', action: 'confirm' });

    expect(chat.edits).toEqual([{ chatId: '1001', messageId: 10, text: 'Tour not found' }]);
  });
});

describe('FunnelService: staff status', () => {
  it('applies a status from the staff chat and edits the prompt', async () => {
    const { store, chat, crm, dispatcher, service } = setup();
    await store.tours.create(newTour);
    await store.leadLinks.save({ userId: '1001', contactId: null, leadId: 42 });

    await service.handleStaffStatus(
      { chatId: STAFF_CHAT, messageId: 33, messageText: '📋 Tour Status Check' },
      { type: 'staff_status', tourId: 1, status: 'attended' },
    );
    await dispatcher.drain();

    expect((await store.tours.findById(1))?.status).toBe('attended');
    expect(chat.edits).toEqual([
      { chatId: STAFF_CHAT, messageId: 33, text: '✅ Tour status updated to: attended\n\n📋 Tour Status Check' },
    ]);
    expect(crm.calls).toEqual([{ method: 'updateLead', leadId: 42, fields: { tourStatus: 'attended' } }]);
    expect(await store.users.findById('1001')).toBeNull();
  });

  it('ignores the same button pressed in another chat', async () => {
    const { store, chat, service } = setup();
    await store.tours.create(newTour);

    await service.handleStaffStatus(
      { chatId: '1001', messageId: 33, messageText: null },
      { type: 'staff_status', tourId: 1, status: 'attended' },
    );

    expect((await store.tours.findById(1))?.status).toBe('booked');
    expect(chat.edits).toEqual([]);
  });

  it('does not move a terminal tour', async () => {
    const { store, chat, service } = setup();
    const tour = await store.tours.create(newTour);
    await store.tours.transitionStatus(tour.id, 'cancelled');

    await service.handleStaffStatus(
      { chatId: STAFF_CHAT, messageId: 33, messageText: null },
      { type: 'staff_status', tourId: tour.id, status: 'attended' },
    );

    expect((await store.tours.findById(tour.id))?.status).toBe('cancelled');
    expect(chat.edits).toEqual([]);
  });
});
