import { Decimal } from "decimal.js";

export interface IRateModifier {
  apply(monthlyRate: Decimal): Decimal;
}
