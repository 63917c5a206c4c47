export const VEHICLE_TYPES = ['CAR', 'SUV', 'MOTORCYCLE'] as const;

export type VehicleType = typeof VEHICLE_TYPES[number];
