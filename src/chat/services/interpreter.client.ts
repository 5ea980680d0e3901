import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import axios from 'axios';
import {
  CircuitBreaker,
  CircuitOpenError,
} from '../../common/utils/resilience';
import { debugLog } from '../../common/utils/debug-logger';
import { EventGuardrailsService } from '../../follow-up/event-guardrails.service';
import { CandidateEvent } from '../../follow-up/follow-up.types';
import {
  InterpretRequest,
  InterpretResponse,
  Interpreter,
  InterpreterError,
} from '../contracts';

function isInterpretResponse(data: unknown): data is InterpretResponse {
  return (
    typeof data === 'object' &&
    data !== null &&
    'events' in data &&
    Array.isArray(data.events)
  );
}

export const INTERPRETER_TIMEOUT_MS = 15_000;

/**
 * HTTP client for the natural-language interpreter.
 * POSTs the user's text to `${INTERPRETER_URL}/parse` and returns the
 * candidate events that pass the guardrails.
 */
@Injectable()
export class HttpInterpreterClient implements Interpreter {
  private readonly log = new Logger(HttpInterpreterClient.name);
  private readonly timeout = INTERPRETER_TIMEOUT_MS;
  private readonly circuitBreaker: CircuitBreaker;

  constructor(
    private readonly cfg: ConfigService,
    private readonly guardrails: EventGuardrailsService,
  ) {
    // Circuit breaker: 5 failures -> open for 30s
    this.circuitBreaker = new CircuitBreaker('interpreter', {
      failureThreshold: 5,
      resetTimeoutMs: 30_000,
      halfOpenMaxAttempts: 2,
    });
  }

  async interpret(text: string, userId: string): Promise<CandidateEvent[]> {
    const baseUrl = this.cfg.get<string>('INTERPRETER_URL');
    if (!baseUrl) {
      throw new InterpreterError(
        'NOT_CONFIGURED',
        'the interpreter is not configured',
      );
    }

    const request: InterpretRequest = { text, user_id: userId };
    debugLog.interpreter.link('POST /parse', { userId, text });
    const done = debugLog.interpreter.timer('interpret');

    let data: unknown;
    try {
      data = await this.circuitBreaker.execute(async () => {
        const res = await axios.post<unknown>(`${baseUrl}/parse`, request, {
          timeout: this.timeout,
        });
        return res.data;
      });
    } catch (err) {
      throw this.toInterpreterError(err);
    } finally {
      done();
    }

    if (!isInterpretResponse(data)) {
      this.log.error('[interpret] Invalid response structure from interpreter');
      throw new InterpreterError(
        'INVALID_RESPONSE',
        'the interpreter sent an unreadable response',
      );
    }

    const { events, rejected } = this.guardrails.validateAll(data.events);
    if (rejected.length > 0) {
      this.log.warn(
        `[interpret] Dropped ${rejected.length} invalid event(s): ${rejected.join('; ')}`,
      );
    }
    return events;
  }

  private toInterpreterError(err: unknown): InterpreterError {
    if (err instanceof CircuitOpenError) {
      this.log.warn(
        `[interpret] Circuit breaker open. Retry in ${err.retryAfterMs}ms`,
      );
      return new InterpreterError(
        'CIRCUIT_OPEN',
        'the interpreter is temporarily unavailable',
      );
    }

    if (
      axios.isAxiosError(err) &&
      (err.code === 'ECONNABORTED' || err.code === 'ETIMEDOUT')
    ) {
      this.log.warn('[interpret] Interpreter timed out');
      return new InterpreterError('TIMEOUT', 'the interpreter timed out');
    }

    this.log.error(`[interpret] Error: ${String(err)}`);
    return new InterpreterError(
      'UNAVAILABLE',
      'could not reach the interpreter',
    );
  }
}
