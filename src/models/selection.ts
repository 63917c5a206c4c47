import { z } from "zod";
import { PERMIT_TYPES, PermitType } from "../dtos/permit.dto";
import { VEHICLE_TYPES, VehicleType } from "../dtos/vehicle.dto";
import { SelectionInput } from "../dtos/selection.dto";
import { InvalidSelectionError } from "../core/errors";
import { Result, ok, err } from "../core/result";

export const MIN_MONTHS = 1;
export const MAX_MONTHS = 12;

const MONTHS_RANGE = `Months must be between ${MIN_MONTHS} and ${MAX_MONTHS}`;

const enumErrorMap = (label: string): z.ZodErrorMap => (issue, ctx) => ({
  message: issue.code === 'invalid_enum_value'
    ? `Unknown ${label.toLowerCase()}: ${String(ctx.data)}`
    : `${label} is required`,
});

const selectionSchema = z.object({
  permitType: z.enum(PERMIT_TYPES, { errorMap: enumErrorMap('Permit type') }),
  vehicleType: z.enum(VEHICLE_TYPES, { errorMap: enumErrorMap('Vehicle type') }),
  carpool: z.boolean(),
  months: z.number()
    .int('Months must be a whole number')
    .min(MIN_MONTHS, MONTHS_RANGE)
    .max(MAX_MONTHS, MONTHS_RANGE),
});

export class Selection {
  private constructor(
    readonly permitType: PermitType,
    readonly vehicleType: VehicleType,
    readonly carpool: boolean,
    readonly months: number,
  ) {
    Object.freeze(this);
  }

  static create(input: SelectionInput): Result<Selection, InvalidSelectionError> {
    const parsed = selectionSchema.safeParse(input);
    if (!parsed.success) {
      return err(new InvalidSelectionError(parsed.error.issues[0].message));
    }
    const { permitType, vehicleType, carpool, months } = parsed.data;
    return ok(new Selection(permitType, vehicleType, carpool, months));
  }
}
