// Customer Model

export interface CustomerRow {
  id: number;
  name: string; // VARCHAR(100)
  email: string; // unique
  phone: string | null; // VARCHAR(20)
  created_at: Date; // set on insert, never updated
}

export interface Customer {
  id: number;
  name: string;
  email: string;
  phone: string | null;
  created_at: string; // ISO 8601
}

export interface CreateCustomerInput {
  name: string;
  email: string;
  phone: string | null;
}

export const toCustomer = (row: CustomerRow): Customer => ({
  id: row.id,
  name: row.name,
  email: row.email,
  phone: row.phone,
  created_at: row.created_at.toISOString(),
});
