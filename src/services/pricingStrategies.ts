import { Decimal } from "decimal.js";
import { IPricingStrategy } from "../interfaces/pricingStrategy";
import { Selection } from "../models/selection";

export class ResidentPricingStrategy implements IPricingStrategy {
  constructor(private baseRate: Decimal.Value = '45.00') {}

  computeMonthly(_selection: Selection): Decimal {
    return new Decimal(this.baseRate);
  }
}

/**
 * Commuters get an automatic reduction on the base rate. It is applied here,
 * before any vehicle or carpool modifier, and stacks with the carpool discount.
 */
export class CommuterPricingStrategy implements IPricingStrategy {
  constructor(private baseRate: Decimal.Value = '35.00', private reduction: Decimal.Value = '0.15') {}

  computeMonthly(_selection: Selection): Decimal {
    return new Decimal(this.baseRate).times(new Decimal(1).minus(this.reduction));
  }
}
