import type { Locale } from '@admissions/shared-kernel';

export interface Campus {
  id: string;
  address: string;
  map: string;
}

/** Deployment-specific values the funnel and batch jobs render with */
export interface FunnelSettings {
  campuses: readonly Campus[];
  tourTimes: readonly string[];
  tourWeekdays: readonly number[];
  timezone: string;
  defaultLocale: Locale;
  phonePrefix: string;
  channelLink: string;
  contactPhone: string;
  staffChatId: string | null;
}

export function findCampus(settings: Pick<FunnelSettings, 'campuses'>, id: string): Campus | null {
  return settings.campuses.find((campus) => campus.id === id) ?? null;
}
