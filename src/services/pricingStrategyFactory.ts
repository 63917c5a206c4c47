import { IPricingStrategy } from "../interfaces/pricingStrategy";
import { PermitType } from "../dtos/permit.dto";
import { CommuterPricingStrategy, ResidentPricingStrategy } from "./pricingStrategies";

const resident = new ResidentPricingStrategy();
const commuter = new CommuterPricingStrategy();

export class PricingStrategyFactory {
  static for(type: PermitType): IPricingStrategy {
    switch (type) {
      case 'RESIDENT': return resident;
      case 'COMMUTER': return commuter;
    }
  }
}
