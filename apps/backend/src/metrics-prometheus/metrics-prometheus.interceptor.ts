import { type CallHandler, type ExecutionContext, HttpException, Injectable, type NestInterceptor } from "@nestjs/common";
import { InjectMetric } from "@willsoto/nestjs-prometheus";
import type { Request, Response } from "express";
import type { Counter, Histogram } from "prom-client";
import { type Observable, tap } from "rxjs";

@Injectable()
export class MetricsPrometheusInterceptor implements NestInterceptor {
  constructor(
    @InjectMetric("http_requests_total") private readonly httpRequestsCounter: Counter,
    @InjectMetric("http_request_duration_seconds") private readonly httpRequestDuration: Histogram,
  ) {}

  intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    const request = context.switchToHttp().getRequest<Request>();
    const { method, url } = request;

    // Skip metrics endpoint to avoid recursion
    if (url === "/metrics") {
      return next.handle();
    }

    const startTime = Date.now();
    const path = normalizePath(url);
    const record = (statusCode: number) => {
      const duration = (Date.now() - startTime) / 1000;
      const labels = { method, path, status_code: statusCode };
      this.httpRequestsCounter.inc(labels);
      this.httpRequestDuration.observe(labels, duration);
    };

    return next.handle().pipe(
      tap({
        next: () => {
          record(context.switchToHttp().getResponse<Response>().statusCode);
        },
        error: (error: unknown) => {
          record(error instanceof HttpException ? error.getStatus() : 500);
        },
      }),
    );
  }
}

/**
 * Collapses the request id segment of `/pins/<requestid>` so every pin
 * shares one label value.
 */
export function normalizePath(url: string): string {
  const path = url.split("?")[0] ?? url;
  return path.replace(/^\/pins\/[^/]+/, "/pins/:requestid");
}
