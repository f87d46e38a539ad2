import type { TourStatus } from '@admissions/shared-kernel';
import type { LeadLink, NewLeadLink, NewTour, NewUser, TourFlag, TourRecord, UserRecord } from '../domain/types';

export interface UserRepository {
  findById(id: string): Promise<UserRecord | null>;
  /** Inserts the user unless it exists; returns the stored record either way */
  createIfAbsent(input: NewUser): Promise<UserRecord>;
  /**
   * Writes `user` when the stored version still equals `user.version`.
   * Throws ConcurrentUpdateError otherwise.
   */
  save(user: UserRecord): Promise<UserRecord>;
  count(): Promise<number>;
  listIds(): Promise<string[]>;
}

export interface TourRepository {
  create(input: NewTour): Promise<TourRecord>;
  findById(id: number): Promise<TourRecord | null>;
  findByUser(userId: string): Promise<TourRecord[]>;
  /** Oldest `booked` tour of the user */
  findFirstBooked(userId: string): Promise<TourRecord | null>;
  findDueForReminder(date: string): Promise<TourRecord[]>;
  findDueForFollowup(date: string): Promise<TourRecord[]>;
  /** `booked` tours of `date` that nobody resolved */
  findUnresolved(date: string): Promise<TourRecord[]>;
  /**
   * Moves the tour to `to` when its current status is one of `from`
   * (every status allowed to reach `to` by default). Returns null when nothing matched.
   */
  transitionStatus(id: number, to: TourStatus, from?: readonly TourStatus[]): Promise<TourRecord | null>;
  /** Moves the user's booked/confirmed tours to `rescheduled`; returns how many moved */
  supersedeActive(userId: string): Promise<number>;
  /** Sets the flag if it is unset and the tour has `status`; true when this call set it */
  claimFlag(id: number, flag: TourFlag, status: TourStatus): Promise<boolean>;
  releaseFlag(id: number, flag: TourFlag): Promise<void>;
}

export interface LeadLinkRepository {
  save(link: NewLeadLink): Promise<LeadLink>;
  findByUser(userId: string): Promise<LeadLink | null>;
  findUserByLead(leadId: number): Promise<string | null>;
}

export interface Repositories {
  users: UserRepository;
  tours: TourRepository;
  leadLinks: LeadLinkRepository;
}

export interface Store extends Repositories {
  /** Runs `work` atomically; a thrown error rolls every write back */
  transaction<T>(work: (tx: Repositories) => Promise<T>): Promise<T>;
  close(): Promise<void>;
}
