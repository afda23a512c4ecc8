/**
 * Ledger routes
 * Read-only queries plus the mutating operations, each acting as the
 * account named in X-Ledger-Account
 */

import { Hono } from "hono";
import type { AppBindings } from "../../../types/context.js";
import { accountsRoute, allowancesRoute } from "./accounts.js";
import { eventsRoute } from "./events.js";
import { pauseRoute } from "./pause.js";
import { rolesRoute } from "./roles.js";
import { supplyRoute } from "./supply.js";
import { tokenRoute } from "./token.js";
import { approvalsRoute, transfersRoute } from "./transfers.js";

const ledgerRoutes = new Hono<AppBindings>();

// Queries
ledgerRoutes.route("/token", tokenRoute);
ledgerRoutes.route("/accounts", accountsRoute);
ledgerRoutes.route("/allowances", allowancesRoute);
ledgerRoutes.route("/events", eventsRoute);

// Mutations
ledgerRoutes.route("/", supplyRoute);
ledgerRoutes.route("/", pauseRoute);
ledgerRoutes.route("/transfers", transfersRoute);
ledgerRoutes.route("/approvals", approvalsRoute);
ledgerRoutes.route("/roles", rolesRoute);

export { ledgerRoutes };
