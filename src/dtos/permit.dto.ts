export const PERMIT_TYPES = ['RESIDENT', 'COMMUTER'] as const;

export type PermitType = typeof PERMIT_TYPES[number];
