// src/middleware/request-start.middleware.ts

import { Injectable, NestMiddleware } from '@nestjs/common';
import { NextFunction, Request, Response } from 'express';
import { markRequestStart } from '../context/request-lifecycle';

/**
 * Starts the request clock before guards and routing, so requests rejected
 * there still report how long they took.
 */
@Injectable()
export class RequestStartMiddleware implements NestMiddleware {
    use(req: Request, _res: Response, next: NextFunction): void {
        markRequestStart(req);
        next();
    }
}
