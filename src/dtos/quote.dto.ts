import { Decimal } from "decimal.js";
import { Selection } from "../models/selection";

/**
 * One priced selection. Amounts are kept at full precision;
 * rounding happens only when the receipt is rendered.
 */
export interface Quote {
  id: string;
  selection: Selection;
  monthlyRate: Decimal;
  subtotal: Decimal;
  campusFee: Decimal;
  total: Decimal;
}
