import { Provider } from "@nestjs/common";
import { Mutex } from "async-mutex";

/**
 * One lock for every write transaction on the shared SQLite connection.
 * The escrow engine holds it across a whole transition, so ledger writes
 * made from inside a transition must not take it again.
 */
export const DATABASE_WRITE_LOCK = Symbol("DATABASE_WRITE_LOCK");

export const databaseWriteLockProvider: Provider = {
	provide: DATABASE_WRITE_LOCK,
	useFactory: () => new Mutex(),
};
