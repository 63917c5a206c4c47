import { v4 as uuid } from 'uuid';
import { Logger } from "winston";
import { Selection } from "../models/selection";
import { Quote } from "../dtos/quote.dto";
import { PricingCalculator } from "./pricingCalculator";

export class QuoteService {
  private readonly logger: Logger;

  constructor(logger: Logger, private newId: () => string = () => uuid()) {
    this.logger = logger.child({ context: 'QuoteService' });
  }

  quote(selection: Selection): Quote {
    const calculator = PricingCalculator.forSelection(selection);
    const monthlyRate = calculator.computeMonthlyRate(selection);
    const subtotal = calculator.computeSubtotal(selection);
    const campusFee = calculator.computeCampusFee(subtotal);
    const total = calculator.computeTotal(subtotal);

    const quote: Quote = { id: this.newId(), selection, monthlyRate, subtotal, campusFee, total };
    this.logger.debug('Quote computed', {
      id: quote.id,
      permitType: selection.permitType,
      vehicleType: selection.vehicleType,
      carpool: selection.carpool,
      months: selection.months,
      total: total.toString(),
    });
    return quote;
  }
}
