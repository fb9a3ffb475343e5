export const DEFAULT_CARGO_TYPE = 'General';

/**
 * Mission as received from the request layer, after shape validation but
 * before quantities are derived.
 */
export interface MissionDescriptor {
  id: string;
  pickup: string;
  dropoffs: string[];
  cargoScu: number;
  cargoType?: string;
  dropoffCargoTypes?: string[];
  dropoffCargoAmounts?: number[];
  payout?: number;
  description?: string;
}

/**
 * Normalised mission. Per-dropoff types and amounts always have exactly one
 * entry per dropoff. Progress lives in the MissionLedger, never here.
 */
export interface CargoMission {
  readonly id: string;
  readonly pickup: string;
  readonly dropoffs: ReadonlyArray<string>;
  readonly cargoScu: number;
  readonly cargoType: string;
  readonly dropoffCargoTypes: ReadonlyArray<string>;
  readonly dropoffCargoAmounts: ReadonlyArray<number>;
  readonly payout: number;
  readonly description: string;
}

export enum MissionStatus {
  Pending = 'Pending',
  InProgress = 'InProgress',
  Completed = 'Completed',
}

export interface ShipDefinition {
  id: string;
  name: string;
  cargo_capacity: number;
}
