import { ConfigService } from '@nestjs/config';
import axios, { AxiosError } from 'axios';
import { EventGuardrailsService } from '../../follow-up/event-guardrails.service';
import { InterpreterError } from '../contracts';
import { HttpInterpreterClient } from './interpreter.client';

describe('HttpInterpreterClient', () => {
  const config = new ConfigService({ INTERPRETER_URL: 'http://interpreter.test' });
  let client: HttpInterpreterClient;
  let post: jest.SpyInstance;

  beforeEach(() => {
    client = new HttpInterpreterClient(config, new EventGuardrailsService());
    post = jest.spyOn(axios, 'post');
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('posts the text and keeps the valid events', async () => {
    post.mockResolvedValue({
      data: {
        events: [
          { kind: 'null_statement' },
          { kind: 'budget', data: { name: 'no action' } },
        ],
      },
    });

    await expect(client.interpret('hello', 'u1')).resolves.toEqual([
      { kind: 'null_statement' },
    ]);
    expect(post).toHaveBeenCalledWith(
      'http://interpreter.test/parse',
      { text: 'hello', user_id: 'u1' },
      { timeout: 15_000 },
    );
  });

  it('rejects a response without an events list', async () => {
    post.mockResolvedValue({ data: { reply: 'hi' } });

    await expect(client.interpret('hello', 'u1')).rejects.toMatchObject({
      code: 'INVALID_RESPONSE',
    });
  });

  it('maps a timeout', async () => {
    post.mockRejectedValue(new AxiosError('timeout of 15000ms exceeded', 'ECONNABORTED'));

    await expect(client.interpret('hello', 'u1')).rejects.toMatchObject({
      code: 'TIMEOUT',
      message: 'the interpreter timed out',
    });
  });

  it('opens the circuit after repeated failures', async () => {
    post.mockRejectedValue(new Error('socket hang up'));

    for (let i = 0; i < 5; i++) {
      await expect(client.interpret('hello', 'u1')).rejects.toMatchObject({
        code: 'UNAVAILABLE',
      });
    }
    await expect(client.interpret('hello', 'u1')).rejects.toMatchObject({
      code: 'CIRCUIT_OPEN',
    });
    expect(post).toHaveBeenCalledTimes(5);
  });

  it('refuses to run without a configured URL', async () => {
    const unconfigured = new HttpInterpreterClient(
      new ConfigService({}),
      new EventGuardrailsService(),
    );

    await expect(unconfigured.interpret('hello', 'u1')).rejects.toBeInstanceOf(
      InterpreterError,
    );
    expect(post).not.toHaveBeenCalled();
  });
});
