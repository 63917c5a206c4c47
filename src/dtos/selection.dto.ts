import { PermitType } from "./permit.dto";
import { VehicleType } from "./vehicle.dto";

// Raw request as it arrives from the input boundary, before validation.
export interface SelectionInput {
  permitType?: PermitType | null;
  vehicleType?: VehicleType | null;
  carpool: boolean;
  months: number;
}
