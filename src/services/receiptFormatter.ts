import { Decimal } from "decimal.js";
import { Quote } from "../dtos/quote.dto";

const RULE = '-'.repeat(34);
const LABEL_WIDTH = 14;

export function formatMoney(amount: Decimal): string {
  return `$${amount.toFixed(2, Decimal.ROUND_HALF_UP)}`;
}

export function formatReceipt(quote: Quote): string {
  const { selection } = quote;
  const rows: Array<[string, string]> = [
    ['Quote:', quote.id],
    ['Permit type:', selection.permitType],
    ['Vehicle type:', selection.vehicleType],
    ['Carpool:', selection.carpool ? 'Yes' : 'No'],
    ['Months:', String(selection.months)],
    ['Subtotal:', formatMoney(quote.subtotal)],
    ['Campus fee:', formatMoney(quote.campusFee)],
    ['Total:', formatMoney(quote.total)],
  ];
  return [
    '----- Parking Permit Receipt -----',
    ...rows.map(([label, value]) => `${label.padEnd(LABEL_WIDTH)}${value}`),
    RULE,
  ].join('\n');
}
