/**
 * Proposal lifecycle routes.
 *
 * POST /api/v1/proposals                — Create a proposal
 * GET  /api/v1/proposals                — List proposals (cursor pagination)
 * GET  /api/v1/proposals/:index         — Get a single proposal
 * POST /api/v1/proposals/:index/approve — Approve a proposal
 * POST /api/v1/proposals/:index/execute — Execute a proposal
 */

import { Hono } from "hono";
import type { Proposal } from "@cosign/multisig";
import { proposalStatus } from "@cosign/multisig";
import type { AppEnv } from "../types/api-contract.js";
import {
  ExecuteProposalSchema,
  IndexParamSchema,
  ListProposalsQuerySchema,
  createProposalSchema,
} from "../types/dto.js";
import type { RequestLimits } from "../types/dto.js";
import { validateBody } from "../middleware/validate.js";
import { createErrorEnvelope } from "../types/error.js";
import { paginate } from "../types/pagination.js";

function present(proposal: Proposal) {
  return { ...proposal, status: proposalStatus(proposal) };
}

function parseIndex(raw: string): number | undefined {
  const result = IndexParamSchema.safeParse(raw);
  return result.success ? result.data : undefined;
}

const INVALID_INDEX = createErrorEnvelope(
  "VALIDATION_ERROR",
  "Proposal index must be a positive integer",
);

export function createProposalRoutes(limits: RequestLimits): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  // POST /api/v1/proposals — Create
  routes.post("/", validateBody(createProposalSchema(limits)), (c) => {
    const body = c.get("validatedBody");
    const proposal = c.get("service").createProposal(c.get("identity"), body);

    c.get("log").info({ index: proposal.index, handler: body.handler }, "Proposal created");
    return c.json({ data: present(proposal) }, 201);
  });

  // GET /api/v1/proposals — List
  routes.get("/", (c) => {
    const queryResult = ListProposalsQuerySchema.safeParse(c.req.query());
    if (!queryResult.success) {
      return c.json(
        createErrorEnvelope("VALIDATION_ERROR", "Invalid query parameters"),
        400,
      );
    }

    const proposals = c.get("service").listProposals();
    const result = paginate(proposals, queryResult.data, (p) => p.index);
    return c.json({ data: result.data.map(present), pagination: result.pagination });
  });

  // GET /api/v1/proposals/:index — Get one
  routes.get("/:index", (c) => {
    const index = parseIndex(c.req.param("index"));
    if (index === undefined) {
      return c.json(INVALID_INDEX, 400);
    }

    const proposal = c.get("service").getProposal(index);
    if (proposal === undefined) {
      return c.json(createErrorEnvelope("NOT_FOUND", `Proposal ${index} not found`), 404);
    }
    return c.json({ data: present(proposal) });
  });

  // POST /api/v1/proposals/:index/approve
  routes.post("/:index/approve", (c) => {
    const index = parseIndex(c.req.param("index"));
    if (index === undefined) {
      return c.json(INVALID_INDEX, 400);
    }

    const proposal = c.get("service").approveProposal(c.get("identity"), index);
    return c.json({ data: present(proposal) });
  });

  // POST /api/v1/proposals/:index/execute
  routes.post("/:index/execute", validateBody(ExecuteProposalSchema), (c) => {
    const index = parseIndex(c.req.param("index"));
    if (index === undefined) {
      return c.json(INVALID_INDEX, 400);
    }

    const { records } = c.get("validatedBody");
    const proposal = c.get("service").executeProposal(c.get("identity"), index, records);

    c.get("log").info({ index, handler: proposal.action.handler }, "Proposal executed");
    return c.json({ data: present(proposal) });
  });

  return routes;
}
