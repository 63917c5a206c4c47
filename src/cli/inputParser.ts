import { PERMIT_TYPES, PermitType } from "../dtos/permit.dto";
import { VEHICLE_TYPES, VehicleType } from "../dtos/vehicle.dto";
import { InvalidSelectionError } from "../core/errors";
import { Result, ok, err } from "../core/result";

function parseMember<T extends string>(
  members: readonly T[],
  label: string,
  text: string,
): Result<T, InvalidSelectionError> {
  const normalized = text.trim().toUpperCase();
  const match = members.find((member) => member === normalized);
  return match === undefined
    ? err(new InvalidSelectionError(`Unknown ${label} "${text.trim()}", expected one of ${members.join(', ')}`))
    : ok(match);
}

export function parsePermitType(text: string): Result<PermitType, InvalidSelectionError> {
  return parseMember(PERMIT_TYPES, 'permit type', text);
}

export function parseVehicleType(text: string): Result<VehicleType, InvalidSelectionError> {
  return parseMember(VEHICLE_TYPES, 'vehicle type', text);
}

// only an explicit Y means yes
export function parseCarpool(text: string): Result<boolean, InvalidSelectionError> {
  return ok(text.trim().toUpperCase() === 'Y');
}

export function parseMonths(text: string): Result<number, InvalidSelectionError> {
  const trimmed = text.trim();
  if (!/^[+-]?\d+$/.test(trimmed)) {
    return err(new InvalidSelectionError(`Months must be a whole number, got "${trimmed}"`));
  }
  return ok(Number(trimmed));
}
