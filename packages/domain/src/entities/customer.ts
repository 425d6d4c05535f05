import type { CalendarDate } from '../values/calendar-date.js';

export type CustomerStatus = 'active' | 'inactive' | 'removed';

export const CUSTOMER_STATUSES: readonly CustomerStatus[] = ['active', 'inactive', 'removed'];

export interface Customer {
  readonly id: string;
  readonly fullName: string;
  /** Unique among non-removed customers. */
  readonly nationalId: string;
  readonly secondaryId: string | null;
  readonly licenseNumber: string;
  readonly licenseExpiry: CalendarDate | null;
  readonly licenseRegion: string;
  readonly phone: string;
  readonly address: string | null;
  readonly notes: string | null;
  readonly status: CustomerStatus;
  readonly createdAt: Date;
  readonly updatedAt: Date;
}
