import { ConcurrentUpdateError } from '@admissions/shared-kernel';
import type { TourStatus } from '@admissions/shared-kernel';
import { ACTIVE_TOUR_STATUSES, tourStatusSources } from '../domain/types';
import type { LeadLink, NewLeadLink, NewTour, NewUser, TourFlag, TourRecord, UserRecord } from '../domain/types';
import { emptyAnswers } from '../domain/types';
import type { LeadLinkRepository, Repositories, Store, TourRepository, UserRepository } from './types';

interface MemoryState {
  users: Map<string, UserRecord>;
  tours: Map<number, TourRecord>;
  leadLinks: Map<string, LeadLink>;
  nextTourId: number;
}

const clone = <T>(value: T): T => structuredClone(value);

type Undo = () => void;

/**
 * Shared state plus the journal of the transaction writing through it, if any.
 * Rolling back reverts only entries this transaction wrote and nobody overwrote since.
 */
class MemoryContext {
  constructor(
    readonly state: MemoryState,
    private readonly journal: Undo[] | null = null,
  ) {}

  put<K, V>(map: Map<K, V>, key: K, value: V): void {
    const previous = map.get(key);
    map.set(key, value);
    this.journal?.push(() => {
      if (map.get(key) !== value) return;
      if (previous === undefined) map.delete(key);
      else map.set(key, previous);
    });
  }
}

function flagChange(flag: TourFlag, value: boolean): Partial<TourRecord> {
  return flag === 'reminderSent' ? { reminderSent: value } : { followupSent: value };
}

class MemoryUserRepository implements UserRepository {
  constructor(private readonly ctx: MemoryContext) {}

  async findById(id: string): Promise<UserRecord | null> {
    const user = this.ctx.state.users.get(id);
    return user ? clone(user) : null;
  }

  async createIfAbsent(input: NewUser): Promise<UserRecord> {
    const { users } = this.ctx.state;
    const existing = users.get(input.id);
    if (existing) return clone(existing);

    const now = new Date();
    const user: UserRecord = {
      ...input,
      state: 'start',
      answers: emptyAnswers(),
      version: 0,
      createdAt: now,
      updatedAt: now,
    };
    this.ctx.put(users, user.id, user);
    return clone(user);
  }

  async save(user: UserRecord): Promise<UserRecord> {
    const { users } = this.ctx.state;
    const stored = users.get(user.id);
    if (!stored || stored.version !== user.version) {
      throw new ConcurrentUpdateError('User', user.id);
    }
    const next: UserRecord = { ...clone(user), version: user.version + 1, updatedAt: new Date() };
    this.ctx.put(users, user.id, next);
    return clone(next);
  }

  async count(): Promise<number> {
    return this.ctx.state.users.size;
  }

  async listIds(): Promise<string[]> {
    return [...this.ctx.state.users.keys()];
  }
}

class MemoryTourRepository implements TourRepository {
  constructor(private readonly ctx: MemoryContext) {}

  private all(): TourRecord[] {
    return [...this.ctx.state.tours.values()].sort((a, b) => a.id - b.id);
  }

  private select(predicate: (tour: TourRecord) => boolean): TourRecord[] {
    return this.all().filter(predicate).map(clone);
  }

  private write(tour: TourRecord, changes: Partial<TourRecord>): TourRecord {
    const next = { ...tour, ...changes, updatedAt: new Date() };
    this.ctx.put(this.ctx.state.tours, tour.id, next);
    return clone(next);
  }

  async create(input: NewTour): Promise<TourRecord> {
    const { state } = this.ctx;
    const now = new Date();
    const tour: TourRecord = {
      ...input,
      id: state.nextTourId,
      status: 'booked',
      reminderSent: false,
      followupSent: false,
      createdAt: now,
      updatedAt: now,
    };
    state.nextTourId += 1;
    this.ctx.put(state.tours, tour.id, tour);
    return clone(tour);
  }

  async findById(id: number): Promise<TourRecord | null> {
    const tour = this.ctx.state.tours.get(id);
    return tour ? clone(tour) : null;
  }

  async findByUser(userId: string): Promise<TourRecord[]> {
    return this.select((tour) => tour.userId === userId);
  }

  async findFirstBooked(userId: string): Promise<TourRecord | null> {
    return this.select((tour) => tour.userId === userId && tour.status === 'booked')[0] ?? null;
  }

  async findDueForReminder(date: string): Promise<TourRecord[]> {
    return this.select((tour) => tour.date === date && tour.status === 'booked' && !tour.reminderSent);
  }

  async findDueForFollowup(date: string): Promise<TourRecord[]> {
    return this.select((tour) => tour.date === date && tour.status === 'attended' && !tour.followupSent);
  }

  async findUnresolved(date: string): Promise<TourRecord[]> {
    return this.select((tour) => tour.date === date && tour.status === 'booked');
  }

  async transitionStatus(
    id: number,
    to: TourStatus,
    from: readonly TourStatus[] = tourStatusSources(to),
  ): Promise<TourRecord | null> {
    const tour = this.ctx.state.tours.get(id);
    if (!tour || !from.includes(tour.status) || !tourStatusSources(to).includes(tour.status)) return null;
    return this.write(tour, { status: to });
  }

  async supersedeActive(userId: string): Promise<number> {
    const active = this.all().filter((tour) => tour.userId === userId && ACTIVE_TOUR_STATUSES.includes(tour.status));
    for (const tour of active) this.write(tour, { status: 'rescheduled' });
    return active.length;
  }

  async claimFlag(id: number, flag: TourFlag, status: TourStatus): Promise<boolean> {
    const tour = this.ctx.state.tours.get(id);
    if (!tour || tour[flag] || tour.status !== status) return false;
    this.write(tour, flagChange(flag, true));
    return true;
  }

  async releaseFlag(id: number, flag: TourFlag): Promise<void> {
    const tour = this.ctx.state.tours.get(id);
    if (tour) this.write(tour, flagChange(flag, false));
  }
}

class MemoryLeadLinkRepository implements LeadLinkRepository {
  constructor(private readonly ctx: MemoryContext) {}

  async save(input: NewLeadLink): Promise<LeadLink> {
    const { leadLinks } = this.ctx.state;
    const now = new Date();
    const existing = leadLinks.get(input.userId);
    const link: LeadLink = { ...input, createdAt: existing?.createdAt ?? now, updatedAt: now };
    this.ctx.put(leadLinks, link.userId, link);
    return clone(link);
  }

  async findByUser(userId: string): Promise<LeadLink | null> {
    const link = this.ctx.state.leadLinks.get(userId);
    return link ? clone(link) : null;
  }

  async findUserByLead(leadId: number): Promise<string | null> {
    for (const link of this.ctx.state.leadLinks.values()) {
      if (link.leadId === leadId) return link.userId;
    }
    return null;
  }
}

function repositories(ctx: MemoryContext): Repositories {
  return {
    users: new MemoryUserRepository(ctx),
    tours: new MemoryTourRepository(ctx),
    leadLinks: new MemoryLeadLinkRepository(ctx),
  };
}

/**
 * Process-local store for tests and `STORE_DRIVER=memory`.
 * Records are cloned in and out. Transactions run one at a time; a failed one
 * undoes its own writes and leaves concurrent writes outside it in place.
 * Tour ids handed out inside a failed transaction are not reused.
 */
export class MemoryStore implements Store {
  private readonly state: MemoryState = { users: new Map(), tours: new Map(), leadLinks: new Map(), nextTourId: 1 };
  private queue: Promise<void> = Promise.resolve();

  readonly users: UserRepository;
  readonly tours: TourRepository;
  readonly leadLinks: LeadLinkRepository;

  constructor() {
    const repos = repositories(new MemoryContext(this.state));
    this.users = repos.users;
    this.tours = repos.tours;
    this.leadLinks = repos.leadLinks;
  }

  async transaction<T>(work: (tx: Repositories) => Promise<T>): Promise<T> {
    const run = this.queue.then(async () => {
      const journal: Undo[] = [];
      try {
        return await work(repositories(new MemoryContext(this.state, journal)));
      } catch (err) {
        for (const undo of journal.reverse()) undo();
        throw err;
      }
    });
    this.queue = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }

  async close(): Promise<void> {
    await this.queue;
  }
}
