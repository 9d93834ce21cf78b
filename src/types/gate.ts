/**
 * Gate Entry Types
 *
 * Vehicle movements through the warehouse gate, optionally tied to the
 * intake (gate in) or release (gate out) they deliver or collect.
 */

export type GateEntryType = 'gate_in' | 'gate_out';

export type GateEntryState = 'draft' | 'confirmed' | 'cancelled';

export interface GateEntry {
  id: string;
  name: string;
  company_id: string;
  entry_type: GateEntryType;
  vehicle_number: string;
  driver_name: string;
  driver_contact?: string;
  /** Unix ms */
  entry_time: number;
  intake_id?: string;
  release_id?: string;
  state: GateEntryState;
  notes?: string;
}

export interface CreateGateEntryParams {
  company_id: string;
  entry_type: GateEntryType;
  vehicle_number: string;
  driver_name: string;
  driver_contact?: string;
  entry_time?: number;
  intake_id?: string;
  release_id?: string;
  notes?: string;
}
