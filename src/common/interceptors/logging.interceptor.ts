import {
  Injectable,
  NestInterceptor,
  ExecutionContext,
  CallHandler,
} from '@nestjs/common';
import { Observable } from 'rxjs';
import { tap } from 'rxjs/operators';
import { Request } from 'express';

const LEVELS = ['debug', 'info', 'warn', 'error'] as const;
type LogLevel = (typeof LEVELS)[number];

function resolveLevel(raw: string | undefined): LogLevel {
  const match = LEVELS.find((level) => level === raw);
  return match ?? 'debug';
}

export class Logger {
  private static logLevel: LogLevel = resolveLevel(process.env.LOG_LEVEL);

  static setLevel(level: string) {
    this.logLevel = resolveLevel(level);
  }

  private static enabled(level: LogLevel): boolean {
    return LEVELS.indexOf(level) >= LEVELS.indexOf(this.logLevel);
  }

  static log(message: string, context?: string) {
    if (this.enabled('info')) {
      console.log(`[LOG] ${new Date().toISOString()} [${context || 'App'}] ${message}`);
    }
  }

  static error(message: string, trace: string, context?: string) {
    console.error(`[ERROR] ${new Date().toISOString()} [${context || 'App'}] ${message}`);
    if (trace) {
      console.error(trace);
    }
  }

  static warn(message: string, context?: string) {
    if (this.enabled('warn')) {
      console.warn(`[WARN] ${new Date().toISOString()} [${context || 'App'}] ${message}`);
    }
  }

  static debug(message: string, context?: string) {
    if (this.enabled('debug')) {
      console.debug(`[DEBUG] ${new Date().toISOString()} [${context || 'App'}] ${message}`);
    }
  }
}

@Injectable()
export class LoggingInterceptor implements NestInterceptor {
  intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    const request = context.switchToHttp().getRequest<Request>();
    const { method, url, body, query, params } = request;

    Logger.debug(
      `Request: ${method} ${url} \nBody: ${JSON.stringify(body)} \nQuery: ${JSON.stringify(query)} \nParams: ${JSON.stringify(params)}`,
      'LoggingInterceptor',
    );

    const now = Date.now();
    return next.handle().pipe(
      tap((response) => {
        Logger.debug(
          `Response: ${method} ${url} ${Date.now() - now}ms \nResponse: ${JSON.stringify(response)}`,
          'LoggingInterceptor',
        );
      }),
    );
  }
}
