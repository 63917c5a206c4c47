import { Decimal } from "decimal.js";
import { IRateModifier } from "../interfaces/rateModifier";
import { VehicleType } from "../dtos/vehicle.dto";

export class MultiplierModifier implements IRateModifier {
  private readonly factor: Decimal;

  constructor(factor: Decimal.Value) {
    this.factor = new Decimal(factor);
  }

  apply(monthlyRate: Decimal): Decimal {
    return monthlyRate.times(this.factor);
  }
}

export const VEHICLE_MULTIPLIERS: Readonly<Record<VehicleType, string>> = {
  CAR: '1.00',
  SUV: '1.15',
  MOTORCYCLE: '0.70',
};

const VEHICLE_MODIFIERS: Readonly<Record<VehicleType, IRateModifier>> = {
  CAR: new MultiplierModifier(VEHICLE_MULTIPLIERS.CAR),
  SUV: new MultiplierModifier(VEHICLE_MULTIPLIERS.SUV),
  MOTORCYCLE: new MultiplierModifier(VEHICLE_MULTIPLIERS.MOTORCYCLE),
};

export function vehicleModifier(type: VehicleType): IRateModifier {
  return VEHICLE_MODIFIERS[type];
}

export const CARPOOL_DISCOUNT: IRateModifier = new MultiplierModifier('0.90');
