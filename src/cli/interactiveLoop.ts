import { Logger } from "winston";
import { InvalidSelectionError } from "../core/errors";
import { Result } from "../core/result";
import { Quote } from "../dtos/quote.dto";
import { Selection, MIN_MONTHS, MAX_MONTHS } from "../models/selection";
import { QuoteService } from "../services/quoteService";
import { formatReceipt } from "../services/receiptFormatter";
import { parseCarpool, parseMonths, parsePermitType, parseVehicleType } from "./inputParser";

export interface Prompter {
  /** Resolves null when no more input will arrive. */
  ask(question: string): Promise<string | null>;
  print(line: string): void;
}

export const PROMPTS = {
  permitType: 'Permit type (RESIDENT/COMMUTER): ',
  vehicleType: 'Vehicle type (CAR/SUV/MOTORCYCLE): ',
  carpool: 'Carpool? (Y/N): ',
  months: `Months (${MIN_MONTHS}-${MAX_MONTHS}): `,
} as const;

export type LoopStep =
  | { kind: 'quoted'; quote: Quote }
  | { kind: 'rejected'; error: InvalidSelectionError }
  | { kind: 'closed' };

type Answer<T> = Result<T, InvalidSelectionError> | null;

export class InteractiveLoop {
  private readonly logger: Logger;

  constructor(private prompter: Prompter, private quotes: QuoteService, logger: Logger) {
    this.logger = logger.child({ context: 'InteractiveLoop' });
  }

  /** Runs until input closes and returns how many quotes were printed. */
  async run(): Promise<number> {
    let quoted = 0;
    for (;;) {
      const step = await this.runOnce();
      if (step.kind === 'closed') return quoted;
      if (step.kind === 'quoted') quoted++;
    }
  }

  async runOnce(): Promise<LoopStep> {
    const selection = await this.readSelection();
    if (selection === null) return { kind: 'closed' };

    if (!selection.ok) {
      this.prompter.print(`ERROR: ${selection.error.message}`);
      this.prompter.print('Please try again.');
      this.logger.info('Selection rejected', { reason: selection.error.message });
      return { kind: 'rejected', error: selection.error };
    }

    const quote = this.quotes.quote(selection.value);
    this.prompter.print(formatReceipt(quote));
    this.prompter.print('');
    return { kind: 'quoted', quote };
  }

  private async readSelection(): Promise<Answer<Selection>> {
    const permitType = await this.answer(PROMPTS.permitType, parsePermitType);
    if (permitType === null || !permitType.ok) return permitType;

    const vehicleType = await this.answer(PROMPTS.vehicleType, parseVehicleType);
    if (vehicleType === null || !vehicleType.ok) return vehicleType;

    const carpool = await this.answer(PROMPTS.carpool, parseCarpool);
    if (carpool === null || !carpool.ok) return carpool;

    const months = await this.answer(PROMPTS.months, parseMonths);
    if (months === null || !months.ok) return months;

    return Selection.create({
      permitType: permitType.value,
      vehicleType: vehicleType.value,
      carpool: carpool.value,
      months: months.value,
    });
  }

  private async answer<T>(
    question: string,
    parse: (text: string) => Result<T, InvalidSelectionError>,
  ): Promise<Answer<T>> {
    const text = await this.prompter.ask(question);
    return text === null ? null : parse(text);
  }
}
