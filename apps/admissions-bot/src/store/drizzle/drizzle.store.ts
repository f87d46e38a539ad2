import { and, asc, count, eq, inArray } from 'drizzle-orm';
import type { PgDatabase } from 'drizzle-orm/pg-core';
import type { NodePgQueryResultHKT } from 'drizzle-orm/node-postgres';
import type pg from 'pg';
import { ConcurrentUpdateError } from '@admissions/shared-kernel';
import type { TourStatus } from '@admissions/shared-kernel';
import { ACTIVE_TOUR_STATUSES, FunnelAnswersSchema, emptyAnswers, tourStatusSources } from '../../domain/types';
import type { LeadLink, NewLeadLink, NewTour, NewUser, TourFlag, TourRecord, UserRecord } from '../../domain/types';
import type { LeadLinkRepository, Repositories, Store, TourRepository, UserRepository } from '../types';
import { botUsers, leadLinks, tours } from './schema';
import type { LeadLinkRow, TourRow, UserRow } from './schema';

/** Either the root database handle or an open transaction */
type Db = PgDatabase<NodePgQueryResultHKT>;

function toUser(row: UserRow): UserRecord {
  return { ...row, answers: FunnelAnswersSchema.parse(row.answers) };
}

function toTour(row: TourRow): TourRecord {
  return row;
}

function toLeadLink(row: LeadLinkRow): LeadLink {
  return row;
}

class DrizzleUserRepository implements UserRepository {
  constructor(private readonly db: Db) {}

  async findById(id: string): Promise<UserRecord | null> {
    const [row] = await this.db.select().from(botUsers).where(eq(botUsers.id, id)).limit(1);
    return row ? toUser(row) : null;
  }

  async createIfAbsent(input: NewUser): Promise<UserRecord> {
    const [created] = await this.db
      .insert(botUsers)
      .values({ ...input, answers: emptyAnswers() })
      .onConflictDoNothing({ target: botUsers.id })
      .returning();
    if (created) return toUser(created);

    const existing = await this.findById(input.id);
    if (!existing) throw new ConcurrentUpdateError('User', input.id);
    return existing;
  }

  async save(user: UserRecord): Promise<UserRecord> {
    const [row] = await this.db
      .update(botUsers)
      .set({
        username: user.username,
        language: user.language,
        state: user.state,
        answers: user.answers,
        version: user.version + 1,
        updatedAt: new Date(),
      })
      .where(and(eq(botUsers.id, user.id), eq(botUsers.version, user.version)))
      .returning();
    if (!row) throw new ConcurrentUpdateError('User', user.id);
    return toUser(row);
  }

  async count(): Promise<number> {
    const [row] = await this.db.select({ value: count() }).from(botUsers);
    return row?.value ?? 0;
  }

  async listIds(): Promise<string[]> {
    const rows = await this.db.select({ id: botUsers.id }).from(botUsers).orderBy(asc(botUsers.createdAt));
    return rows.map((row) => row.id);
  }
}

class DrizzleTourRepository implements TourRepository {
  constructor(private readonly db: Db) {}

  private async where(condition: ReturnType<typeof and>): Promise<TourRecord[]> {
    const rows = await this.db.select().from(tours).where(condition).orderBy(asc(tours.id));
    return rows.map(toTour);
  }

  async create(input: NewTour): Promise<TourRecord> {
    const [row] = await this.db.insert(tours).values(input).returning();
    return toTour(row);
  }

  async findById(id: number): Promise<TourRecord | null> {
    const [row] = await this.db.select().from(tours).where(eq(tours.id, id)).limit(1);
    return row ? toTour(row) : null;
  }

  findByUser(userId: string): Promise<TourRecord[]> {
    return this.where(eq(tours.userId, userId));
  }

  async findFirstBooked(userId: string): Promise<TourRecord | null> {
    const [first] = await this.where(and(eq(tours.userId, userId), eq(tours.status, 'booked')));
    return first ?? null;
  }

  findDueForReminder(date: string): Promise<TourRecord[]> {
    return this.where(and(eq(tours.date, date), eq(tours.status, 'booked'), eq(tours.reminderSent, false)));
  }

  findDueForFollowup(date: string): Promise<TourRecord[]> {
    return this.where(and(eq(tours.date, date), eq(tours.status, 'attended'), eq(tours.followupSent, false)));
  }

  findUnresolved(date: string): Promise<TourRecord[]> {
    return this.where(and(eq(tours.date, date), eq(tours.status, 'booked')));
  }

  async transitionStatus(
    id: number,
    to: TourStatus,
    from: readonly TourStatus[] = tourStatusSources(to),
  ): Promise<TourRecord | null> {
    const allowed = tourStatusSources(to).filter((status) => from.includes(status));
    if (allowed.length === 0) return null;

    const [row] = await this.db
      .update(tours)
      .set({ status: to, updatedAt: new Date() })
      .where(and(eq(tours.id, id), inArray(tours.status, allowed)))
      .returning();
    return row ? toTour(row) : null;
  }

  async supersedeActive(userId: string): Promise<number> {
    const rows = await this.db
      .update(tours)
      .set({ status: 'rescheduled', updatedAt: new Date() })
      .where(and(eq(tours.userId, userId), inArray(tours.status, [...ACTIVE_TOUR_STATUSES])))
      .returning({ id: tours.id });
    return rows.length;
  }

  async claimFlag(id: number, flag: TourFlag, status: TourStatus): Promise<boolean> {
    const column = flag === 'reminderSent' ? tours.reminderSent : tours.followupSent;
    const rows = await this.db
      .update(tours)
      .set({ ...(flag === 'reminderSent' ? { reminderSent: true } : { followupSent: true }), updatedAt: new Date() })
      .where(and(eq(tours.id, id), eq(tours.status, status), eq(column, false)))
      .returning({ id: tours.id });
    return rows.length > 0;
  }

  async releaseFlag(id: number, flag: TourFlag): Promise<void> {
    await this.db
      .update(tours)
      .set({ ...(flag === 'reminderSent' ? { reminderSent: false } : { followupSent: false }), updatedAt: new Date() })
      .where(eq(tours.id, id));
  }
}

class DrizzleLeadLinkRepository implements LeadLinkRepository {
  constructor(private readonly db: Db) {}

  async save(link: NewLeadLink): Promise<LeadLink> {
    const [row] = await this.db
      .insert(leadLinks)
      .values(link)
      .onConflictDoUpdate({
        target: leadLinks.userId,
        set: { contactId: link.contactId, leadId: link.leadId, updatedAt: new Date() },
      })
      .returning();
    return toLeadLink(row);
  }

  async findByUser(userId: string): Promise<LeadLink | null> {
    const [row] = await this.db.select().from(leadLinks).where(eq(leadLinks.userId, userId)).limit(1);
    return row ? toLeadLink(row) : null;
  }

  async findUserByLead(leadId: number): Promise<string | null> {
    const [row] = await this.db
      .select({ userId: leadLinks.userId })
      .from(leadLinks)
      .where(eq(leadLinks.leadId, leadId))
      .limit(1);
    return row?.userId ?? null;
  }
}

function repositories(db: Db): Repositories {
  return {
    users: new DrizzleUserRepository(db),
    tours: new DrizzleTourRepository(db),
    leadLinks: new DrizzleLeadLinkRepository(db),
  };
}

/** PostgreSQL store; schema lives in sql/schema.sql */
export class DrizzleStore implements Store {
  readonly users: UserRepository;
  readonly tours: TourRepository;
  readonly leadLinks: LeadLinkRepository;

  constructor(
    private readonly db: Db,
    private readonly pool: pg.Pool,
  ) {
    const repos = repositories(db);
    this.users = repos.users;
    this.tours = repos.tours;
    this.leadLinks = repos.leadLinks;
  }

  transaction<T>(work: (tx: Repositories) => Promise<T>): Promise<T> {
    return this.db.transaction((tx) => work(repositories(tx)));
  }

  async close(): Promise<void> {
    await this.pool.end();
  }
}
