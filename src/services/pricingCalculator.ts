import { Decimal } from "decimal.js";
import { IPricingStrategy } from "../interfaces/pricingStrategy";
import { Selection } from "../models/selection";
import { ModifierPipeline } from "./modifierPipeline";
import { PricingStrategyFactory } from "./pricingStrategyFactory";

export const CAMPUS_FEE_RATE = new Decimal('0.05');

export class PricingCalculator {
  constructor(private strategy: IPricingStrategy, private pipeline: ModifierPipeline) {}

  // the pipeline depends on vehicle and carpool, so a calculator is built per selection
  static forSelection(selection: Selection): PricingCalculator {
    return new PricingCalculator(
      PricingStrategyFactory.for(selection.permitType),
      ModifierPipeline.forSelection(selection),
    );
  }

  computeMonthlyRate(selection: Selection): Decimal {
    return this.pipeline.applyAll(this.strategy.computeMonthly(selection));
  }

  computeSubtotal(selection: Selection): Decimal {
    return this.computeMonthlyRate(selection).times(selection.months);
  }

  computeCampusFee(subtotal: Decimal): Decimal {
    return subtotal.times(CAMPUS_FEE_RATE);
  }

  computeTotal(subtotal: Decimal): Decimal {
    return subtotal.plus(this.computeCampusFee(subtotal));
  }
}
