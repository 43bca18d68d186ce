/**
* Weather Archive - HTTP Routes
*
* Each route resolves to `{ status, body }` from the request query alone, so
* resolution is testable without a socket. `createArchiveRouter` mounts them
* on an Express router.
*/

import { Router, type Request, type Response } from "express";
import { encodeRecord } from "../archive/codec";
import { epochSecondsToDateString } from "../archive/date";
import type { QueryService } from "../archive/query";
import { createSeededRandom } from "../archive/random";

export interface RouteResponse {
  status: number;
  body: unknown;
}

export type QueryParams = Record<string, unknown>;

function stringParam(params: QueryParams, name: string): string | undefined {
  const value = params[name];
  return typeof value === "string" ? value : undefined;
}

function badRequest(error: string, message: string): RouteResponse {
  return { status: 400, body: { error, message } };
}

export function resolveHealth(service: QueryService): RouteResponse {
  const keys = service.archive.keys();
  const from = keys.length > 0 ? epochSecondsToDateString(keys[0]) : null;
  const to = keys.length > 0 ? epochSecondsToDateString(keys[keys.length - 1]) : null;
  return { status: 200, body: { ok: true, records: service.archive.size, from, to } };
}

export function resolveDate(service: QueryService, date: string): RouteResponse {
  const result = service.byDate(date);
  switch (result.kind) {
    case "record":
      return { status: 200, body: encodeRecord(result.record) };
    case "not_found":
      return { status: 404, body: { error: "NOT_FOUND", message: `Data for date: ${date} is not available` } };
    case "invalid":
      return badRequest(result.reason, result.message);
  }
}

export function resolveRange(service: QueryService, params: QueryParams): RouteResponse {
  const range = stringParam(params, "range");
  if (range === undefined) return badRequest("INVALID_RANGE", "Missing range");

  const result = service.byRange(range);
  if (result.kind === "invalid") return badRequest(result.reason, result.message);
  return { status: 200, body: result.records.map(encodeRecord) };
}

export function resolveMean(service: QueryService, params: QueryParams): RouteResponse {
  const range = stringParam(params, "range");
  const variable = stringParam(params, "variable");
  if (range === undefined) return badRequest("INVALID_RANGE", "Missing range");
  if (variable === undefined) return badRequest("UNRECOGNIZED_VARIABLE", "Missing variable");

  const result = service.mean(range, variable, { onMissing: () => undefined });
  switch (result.kind) {
    case "mean":
      return {
        status: 200,
        body: { variable: result.variable, range: result.range.text, mean: result.mean, count: result.count }
      };
    case "no_data":
      return {
        status: 200,
        body: { variable: result.variable, range: result.range.text, mean: null, reason: "NO_DATA" }
      };
    case "invalid":
      return badRequest(result.reason, result.message);
  }
}

export function resolveSample(service: QueryService, params: QueryParams): RouteResponse {
  const range = stringParam(params, "range");
  const years = stringParam(params, "years");
  if (range === undefined) return badRequest("INVALID_RANGE", "Missing range");
  if (years === undefined) return badRequest("INVALID_YEARS", "Missing years");

  const seed = stringParam(params, "seed");
  const random = seed === undefined ? undefined : createSeededRandom(seed);
  const result = service.sample(range, years, random);
  if (result.kind === "invalid") return badRequest(result.reason, result.message);
  return { status: 200, body: result.records.map(encodeRecord) };
}

function send(res: Response, response: RouteResponse): void {
  res.status(response.status).json(response.body);
}

export function createArchiveRouter(service: QueryService): Router {
  const router = Router();

  router.get("/health", (_req: Request, res: Response) => {
    send(res, resolveHealth(service));
  });

  router.get("/records/:date", (req: Request, res: Response) => {
    send(res, resolveDate(service, req.params.date));
  });

  router.get("/records", (req: Request, res: Response) => {
    send(res, resolveRange(service, req.query));
  });

  router.get("/mean", (req: Request, res: Response) => {
    send(res, resolveMean(service, req.query));
  });

  router.get("/sample", (req: Request, res: Response) => {
    send(res, resolveSample(service, req.query));
  });

  return router;
}
