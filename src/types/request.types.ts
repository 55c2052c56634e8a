import { Request } from 'express';
import type { CrmStore } from '../connections/db/store';

/** Runs work against a store whose client is held until the work settles */
export type StoreSession = <T>(work: (store: CrmStore) => Promise<T>) => Promise<T>;

export interface SessionCarrier {
  withStore?: StoreSession;
}

/**
 * Request carrying the database session opened for it
 */
export interface CrmRequest extends Request, SessionCarrier {}
