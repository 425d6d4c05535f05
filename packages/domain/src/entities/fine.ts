import type { Money } from '../values/money.js';

export type FineStatus = 'pending' | 'paid' | 'exempt';

export const FINE_STATUSES: readonly FineStatus[] = ['pending', 'paid', 'exempt'];

export interface Fine {
  readonly id: string;
  readonly reservationId: string;
  readonly infractionType: string;
  readonly amount: Money;
  readonly infractionAt: Date;
  readonly location: string | null;
  readonly status: FineStatus;
  readonly paidAt: Date | null;
  readonly notes: string | null;
  readonly createdAt: Date;
  readonly updatedAt: Date;
}
