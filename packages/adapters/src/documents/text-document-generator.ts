import {
  formatMoney,
  type ContractDetails,
  type Customer,
  type DocumentGeneratorPort,
  type ReturnBreakdown,
  type Vehicle,
} from '@rentdesk/domain';

const RULE = '-'.repeat(48);

function line(label: string, value: string | number): string {
  return `${label.padEnd(24, ' ')}${value}`;
}

/**
 * Renders contracts and receipts as UTF-8 text. Stands in for a PDF
 * renderer behind the same port.
 */
export class TextDocumentGenerator implements DocumentGeneratorPort {
  constructor(private readonly companyName = 'RentDesk Vehicle Rental') {}

  async generateContract(
    customer: Customer,
    vehicle: Vehicle,
    contract: ContractDetails,
  ): Promise<Uint8Array> {
    return this.render([
      this.companyName,
      'VEHICLE RENTAL CONTRACT',
      RULE,
      line('Reservation', contract.reservationId),
      line('Renter', customer.fullName),
      line('National ID', customer.nationalId),
      line('Driver licence', `${customer.licenseNumber} (${customer.licenseRegion})`),
      line('Licence expiry', customer.licenseExpiry ?? '-'),
      line('Phone', customer.phone),
      RULE,
      line('Vehicle', `${vehicle.make} ${vehicle.model} ${vehicle.manufactureYear}`),
      line('Plate', vehicle.plate),
      line('Colour', vehicle.color),
      line('Chassis', vehicle.chassisNumber),
      line('Odometer out (km)', contract.odometerOut),
      line('Km allowance', contract.kmAllowance),
      line('Extra km rate', formatMoney(vehicle.perKmRate)),
      RULE,
      line('Pickup', `${contract.startDate}${contract.deliveryTime ? ` ${contract.deliveryTime}` : ''}`),
      line('Return', contract.endDate),
      line('Daily rate', formatMoney(vehicle.dailyRate)),
      line('Daily charges', formatMoney(contract.totalDailyCharge)),
      line('Paid so far', formatMoney(contract.amountPaid)),
    ]);
  }

  async generateReceipt(
    customer: Customer,
    vehicle: Vehicle,
    breakdown: ReturnBreakdown,
  ): Promise<Uint8Array> {
    const { totals } = breakdown;
    const balanceLine =
      totals.settlement === 'refund_due'
        ? line('REFUND DUE', formatMoney(totals.refundDue))
        : line('Balance due', formatMoney(totals.remainingBalance));

    return this.render([
      this.companyName,
      'RETURN RECEIPT',
      RULE,
      line('Reservation', breakdown.reservationId),
      line('Renter', customer.fullName),
      line('Vehicle', `${vehicle.make} ${vehicle.model} (${vehicle.plate})`),
      line('Period', `${breakdown.startDate} to ${breakdown.returnDate}`),
      line('Days', breakdown.days),
      line('Km driven', `${breakdown.kmDriven} (${breakdown.odometerOut} to ${breakdown.odometerIn})`),
      line('Km allowance', breakdown.kmAllowance),
      line('Billable km', breakdown.billableKm),
      RULE,
      line('Daily charges', formatMoney(totals.dailyCharge)),
      line('Km charges', formatMoney(totals.kmCharge)),
      line('Extras', formatMoney(totals.extrasTotal)),
      line('Total', formatMoney(totals.grandTotal)),
      line('Paid before return', formatMoney(totals.totalPaid.minus(breakdown.paymentApplied))),
      line('Paid at return', formatMoney(breakdown.paymentReceived)),
      line('Change', formatMoney(breakdown.changeDue)),
      balanceLine,
      ...breakdown.warnings.map((w) => `! ${w}`),
    ]);
  }

  private render(lines: string[]): Uint8Array {
    return Buffer.from(`${lines.join('\n')}\n`, 'utf8');
  }
}
