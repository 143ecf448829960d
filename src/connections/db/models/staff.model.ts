// Staff Model - Based on migration 20251120_000001_create_staff_table

import { Branch, StaffRole } from '../../../constants';

export interface Staff {
  id: string; // UUID
  email: string; // unique, lower-cased, restricted to the staff domain
  first_name: string;
  last_name: string;
  role: StaffRole;
  branch: Branch;
  is_verified: boolean;
  created_at: Date;
  updated_at: Date;
}

export interface CreateStaffInput {
  email: string; // REQUIRED
  first_name: string; // REQUIRED
  last_name: string; // REQUIRED
  branch?: Branch; // default: headquarters
}

export interface UpdateStaffInput {
  first_name?: string;
  last_name?: string;
  branch?: Branch;
  role?: StaffRole;
}
