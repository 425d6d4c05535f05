import type { Customer } from '../../entities/customer.js';
import type { Vehicle } from '../../entities/vehicle.js';
import type { FinalTotal } from '../../rules/pricing.js';
import type { CalendarDate } from '../../values/calendar-date.js';
import type { Money } from '../../values/money.js';

export interface ReturnBreakdown {
  readonly reservationId: string;
  readonly startDate: CalendarDate;
  readonly returnDate: CalendarDate;
  readonly days: number;
  readonly odometerOut: number;
  readonly odometerIn: number;
  readonly kmDriven: number;
  readonly kmAllowance: number;
  readonly billableKm: number;
  readonly totals: FinalTotal;
  readonly paymentReceived: Money;
  /** Part of the payment credited to the reservation. */
  readonly paymentApplied: Money;
  readonly changeDue: Money;
  readonly warnings: readonly string[];
}

export interface ContractDetails {
  readonly reservationId: string;
  readonly startDate: CalendarDate;
  readonly endDate: CalendarDate;
  readonly deliveryTime: string | null;
  readonly odometerOut: number;
  readonly kmAllowance: number;
  readonly totalDailyCharge: Money;
  readonly amountPaid: Money;
}

export interface DocumentGeneratorPort {
  generateContract(customer: Customer, vehicle: Vehicle, contract: ContractDetails): Promise<Uint8Array>;
  generateReceipt(customer: Customer, vehicle: Vehicle, breakdown: ReturnBreakdown): Promise<Uint8Array>;
}
