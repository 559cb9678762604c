/**
 * Route barrel — re-exports all route modules.
 */

export { createHealthRoutes } from "./health.js";
export { createWalletRoutes } from "./wallet.js";
export { createProposalRoutes } from "./proposals.js";
export { createEventRoutes } from "./events.js";
