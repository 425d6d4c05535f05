import {
  formatMoney,
  kmUntilOilChange,
  type AuditEntry,
  type DashboardSummary,
  type FinalTotal,
  type Fine,
  type HistoryEntry,
  type Reservation,
  type ReservationView,
  type ReturnResult,
  type Vehicle,
} from '@rentdesk/domain';

// Money leaves the API as two-decimal strings so no float rounding creeps in
// on the client.

export function presentVehicle(vehicle: Vehicle) {
  return {
    ...vehicle,
    dailyRate: formatMoney(vehicle.dailyRate),
    perKmRate: formatMoney(vehicle.perKmRate),
    kmUntilOilChange: kmUntilOilChange(vehicle),
  };
}

export function presentReservation(reservation: Reservation | ReservationView) {
  return {
    ...reservation,
    advancePayment: formatMoney(reservation.advancePayment),
    partialPayment: formatMoney(reservation.partialPayment),
    washCost: formatMoney(reservation.washCost),
    finesAmount: formatMoney(reservation.finesAmount),
    damagesAmount: formatMoney(reservation.damagesAmount),
    otherCosts: formatMoney(reservation.otherCosts),
    discount: formatMoney(reservation.discount),
    dailyChargeOverride:
      reservation.dailyChargeOverride === null ? null : formatMoney(reservation.dailyChargeOverride),
    totalDailyCharge: formatMoney(reservation.totalDailyCharge),
    kmCharge: formatMoney(reservation.kmCharge),
    grandTotal: formatMoney(reservation.grandTotal),
    remainingBalance: formatMoney(reservation.remainingBalance),
  };
}

export function presentTotals(totals: FinalTotal) {
  return {
    dailyCharge: formatMoney(totals.dailyCharge),
    kmCharge: formatMoney(totals.kmCharge),
    extrasTotal: formatMoney(totals.extrasTotal),
    subtotal: formatMoney(totals.subtotal),
    grandTotal: formatMoney(totals.grandTotal),
    totalPaid: formatMoney(totals.totalPaid),
    signedBalance: formatMoney(totals.signedBalance),
    remainingBalance: formatMoney(totals.remainingBalance),
    refundDue: formatMoney(totals.refundDue),
    settlement: totals.settlement,
  };
}

export function presentReturn(result: ReturnResult) {
  return {
    reservation: presentReservation(result.reservation),
    totals: presentTotals(result.totals),
    returnDate: result.returnDate,
    paymentApplied: formatMoney(result.paymentApplied),
    changeDue: formatMoney(result.changeDue),
    warnings: result.warnings,
    receipt: Buffer.from(result.receipt).toString('base64'),
  };
}

export function presentFine(fine: Fine) {
  return { ...fine, amount: formatMoney(fine.amount) };
}

export function presentDashboard(summary: DashboardSummary) {
  return {
    ...summary,
    monthRevenue: formatMoney(summary.monthRevenue),
    pickupsToday: summary.pickupsToday.map(presentReservation),
    returnsToday: summary.returnsToday.map(presentReservation),
  };
}

export function presentHistoryEntry(entry: HistoryEntry) {
  return {
    reservation: presentReservation(entry.reservation),
    kmDriven: entry.kmDriven,
    fineCount: entry.fineCount,
    finesTotal: formatMoney(entry.finesTotal),
  };
}

export function presentAuditEntry(entry: AuditEntry) {
  return { ...entry, ts: entry.ts.toISOString() };
}
