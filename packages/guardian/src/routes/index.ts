/**
 * Route barrel - re-exports all route modules.
 */

export { createHealthRoutes } from "./health.js";
export { createLedgerRoutes } from "./ledger.js";
export { createSpendingRoutes } from "./spending.js";
export { createTransactionRoutes } from "./transactions.js";
export { createAgentRoutes } from "./agent.js";
