import dayjs, { Dayjs } from "dayjs";
import { v4 as uuidv4 } from "uuid";
import { Cuisine } from "../common/common-enum";
import { MacroTargets } from "../types/model/nutritionTarget";
import { SessionState } from "../types/model/session.model";
import { UserProfile } from "../types/model/userProfile.model";
import { StateError } from "../utils/errors";

const emptyState = (): SessionState => ({
  profile: null,
  macros: null,
  cuisine: null,
});

/**
 * One visitor's profile, targets and cuisine choice
 */
export class DietSession {
  private state: SessionState = emptyState();

  constructor(public readonly id: string) {}

  hasProfile(): boolean {
    return this.state.profile !== null;
  }

  /** A new profile resets targets and takes its cuisine preference. */
  setProfile(profile: UserProfile): void {
    this.state = {
      profile,
      macros: null,
      cuisine: profile.cuisinePreference,
    };
  }

  getProfile(): UserProfile {
    if (!this.state.profile) throw new StateError();
    return this.state.profile;
  }

  setMacros(macros: MacroTargets): void {
    if (!this.state.profile) throw new StateError();
    this.state.macros = macros;
  }

  getMacros(): MacroTargets {
    if (!this.state.profile || !this.state.macros) throw new StateError();
    return this.state.macros;
  }

  setCuisine(cuisine: Cuisine): void {
    if (!this.state.profile) throw new StateError();
    this.state.cuisine = cuisine;
  }

  getCuisine(): Cuisine {
    if (!this.state.profile) throw new StateError();
    return this.state.cuisine ?? this.state.profile.cuisinePreference;
  }

  clear(): void {
    this.state = emptyState();
  }
}

export interface SessionStoreOptions {
  ttlMinutes: number;
  now?: () => Dayjs;
}

interface SessionEntry {
  session: DietSession;
  expiresAt: Dayjs;
}

/**
 * In-memory sessions keyed by id, with a sliding idle timeout. Expired
 * entries are pruned whenever the store is accessed.
 */
export class SessionStore {
  private readonly sessions: Map<string, SessionEntry> = new Map();
  private readonly ttlMinutes: number;
  private readonly now: () => Dayjs;

  constructor({ ttlMinutes, now = () => dayjs() }: SessionStoreOptions) {
    this.ttlMinutes = ttlMinutes;
    this.now = now;
  }

  get size(): number {
    this.prune();
    return this.sessions.size;
  }

  get ttlMs(): number {
    return this.ttlMinutes * 60_000;
  }

  create(): DietSession {
    this.prune();
    const session = new DietSession(uuidv4());
    this.sessions.set(session.id, { session, expiresAt: this.expiry() });
    return session;
  }

  /** Returns the live session and extends its expiry. */
  get(id: string): DietSession | undefined {
    this.prune();
    const entry = this.sessions.get(id);
    if (!entry) return undefined;

    entry.expiresAt = this.expiry();
    return entry.session;
  }

  destroy(id: string): boolean {
    return this.sessions.delete(id);
  }

  private expiry(): Dayjs {
    return this.now().add(this.ttlMinutes, "minute");
  }

  private prune(): void {
    const now = this.now();
    for (const [id, entry] of this.sessions) {
      if (!entry.expiresAt.isAfter(now)) {
        this.sessions.delete(id);
      }
    }
  }
}
