export const LEDGER_GATEWAY = Symbol("LEDGER_GATEWAY");
