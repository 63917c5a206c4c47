import { Decimal } from "decimal.js";
import { Selection } from "../models/selection";

export interface IPricingStrategy {
  computeMonthly(selection: Selection): Decimal;
}
