// src/context/request-lifecycle.ts

import type { Request } from 'express';
import { roundMs } from '../utils/span-ops';

export class RequestMetrics {
    constructor(private readonly startTime: [number, number] = process.hrtime()) {}

    getResponseTime(): number {
        const diff = process.hrtime(this.startTime);
        return roundMs(diff[0] * 1e3 + diff[1] * 1e-6);
    }
}

const metricsByRequest = new WeakMap<Request, RequestMetrics>();
const tracedRequests = new WeakSet<Request>();

/** Start the request clock; later calls keep the first start. */
export function markRequestStart(req: Request): RequestMetrics {
    const existing = metricsByRequest.get(req);
    if (existing) return existing;
    const metrics = new RequestMetrics();
    metricsByRequest.set(req, metrics);
    return metrics;
}

export const markRequestTraced = (req: Request): void => {
    tracedRequests.add(req);
};

/** True once a server span has been chosen for this request. */
export const isRequestTraced = (req: Request): boolean => tracedRequests.has(req);
