// Shared pieces for route handlers

import { z } from 'zod';
import type { Services } from '../services';
import { AppConfig } from '../types/env';
import { ValidationError } from '../utils/errors';

export interface RouteContext {
    config: AppConfig;
    services: Services;
}

export type RouteHandler = (request: Request, ctx: RouteContext) => Promise<Response>;

function describeIssues(error: z.ZodError): string[] {
    return error.issues.map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message));
}

/**
 * Reads and validates a JSON body, throwing ValidationError on bad JSON or bad fields
 */
export async function readJsonBody<S extends z.ZodTypeAny>(request: Request, schema: S): Promise<z.output<S>> {
    let body: unknown;
    try {
        body = await request.json();
    } catch {
        throw new ValidationError(['body must be valid JSON']);
    }
    const parsed = schema.safeParse(body);
    if (!parsed.success) {
        throw new ValidationError(describeIssues(parsed.error));
    }
    return parsed.data;
}

export function parseQuery<S extends z.ZodTypeAny>(url: URL, schema: S): z.output<S> {
    const parsed = schema.safeParse(Object.fromEntries(url.searchParams));
    if (!parsed.success) {
        throw new ValidationError(describeIssues(parsed.error));
    }
    return parsed.data;
}
