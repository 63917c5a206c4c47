import { Decimal } from "decimal.js";
import { IRateModifier } from "../interfaces/rateModifier";
import { Selection } from "../models/selection";
import { CARPOOL_DISCOUNT, vehicleModifier } from "./rateModifiers";

export class ModifierPipeline {
  constructor(private readonly modifiers: readonly IRateModifier[] = []) {}

  // vehicle adjustment first, then the carpool discount when requested
  static forSelection(selection: Selection): ModifierPipeline {
    const modifiers = [vehicleModifier(selection.vehicleType)];
    if (selection.carpool) modifiers.push(CARPOOL_DISCOUNT);
    return new ModifierPipeline(modifiers);
  }

  applyAll(monthlyRate: Decimal): Decimal {
    return this.modifiers.reduce((rate, modifier) => modifier.apply(rate), monthlyRate);
  }
}
