import { NextFunction, Response } from 'express';
import { CrmStore, PgCrmStore, Queryable } from '../connections/db/store';
import { CrmRequest, SessionCarrier, StoreSession } from '../types/request.types';

/** The part of a pg Pool a request session needs */
export interface ClientSource {
  connect(): Promise<Queryable & { release(err?: Error | boolean): void }>;
}

/**
 * Open a session over `pool`: every call checks out a client, runs the work
 * against it and returns the client once the work has settled.
 */
export const openSession = (pool: ClientSource): StoreSession =>
  async <T>(work: (store: CrmStore) => Promise<T>): Promise<T> => {
    const client = await pool.connect();
    try {
      return await work(new PgCrmStore(client));
    } finally {
      client.release();
    }
  };

/** Expose a database session as `req.withStore` */
export const attachStore = (pool: ClientSource) => {
  const session = openSession(pool);
  return (req: CrmRequest, _res: Response, next: NextFunction) => {
    req.withStore = session;
    next();
  };
};

export const withStore = <T>(req: SessionCarrier, work: (store: CrmStore) => Promise<T>): Promise<T> => {
  if (!req.withStore) {
    throw new Error('No database session attached to the request');
  }
  return req.withStore(work);
};
