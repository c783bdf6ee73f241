import { TEXT, JSON_TEMPLATE, type QuizTextConfig } from '../src/config/messages';
import { DeliveryService } from '../src/application/messaging/DeliveryService';
import type { SentPoll, TransportOutcome } from '../src/application/messaging/QuizTransport';
import { InMemoryAuditLog } from '../src/application/sessions/AuditLog';
import { InMemorySessionRepository, SessionStore } from '../src/application/sessions/SessionStore';
import { QuizFlowEngine, type InboundEvent } from '../src/flow-runtime/engine';
import { RateController, type RateControllerOptions } from '../src/flow-runtime/rateController';
import { RecordingTransport, createSilentLogger, noSleep } from './helpers/fakes';

const USER = 1;
const CHAT = 10;

const TWO_QUESTIONS = JSON.stringify({
  all_q: [
    { q: 'Capital of Italy?', o: ['Rome', 'Milan', 'Turin'], c: 0, e: 'Rome' },
    { q: '2+3?', o: ['4', '5'], c: 1 },
  ],
});

interface Harness {
  readonly engine: QuizFlowEngine;
  readonly transport: RecordingTransport;
  readonly store: SessionStore;
  readonly audit: InMemoryAuditLog;
  readonly health: { recordRequest: jest.Mock; recordError: jest.Mock };
}

interface HarnessOptions {
  readonly rate?: RateControllerOptions;
  readonly eventTimeoutMs?: number;
  readonly texts?: QuizTextConfig;
}

function createHarness(options: HarnessOptions = {}): Harness {
  const logger = createSilentLogger();
  const transport = new RecordingTransport();
  const store = new SessionStore({ repository: new InMemorySessionRepository(), retentionMs: 3_600_000, logger });
  const delivery = new DeliveryService({ transport, sleep: noSleep(), config: { pollSpacingMs: 0 }, logger });
  const audit = new InMemoryAuditLog();
  const health = { recordRequest: jest.fn(), recordError: jest.fn() };
  const engine = new QuizFlowEngine({
    store,
    delivery,
    rate: new RateController<number>(options.rate),
    health,
    audit,
    texts: options.texts,
    eventTimeoutMs: options.eventTimeoutMs ?? 5_000,
    messageSpacingMs: 0,
    sleep: noSleep(),
    logger,
  });
  return { engine, transport, store, audit, health };
}

function event(kind: InboundEvent['kind'], extra: Partial<InboundEvent> = {}): InboundEvent {
  return { userId: USER, chatId: CHAT, firstName: 'Ana', kind, ...extra };
}

async function reachAwaitingPayload(harness: Harness, anonymous = true): Promise<void> {
  await harness.engine.handleEvent(event('begin'));
  await harness.engine.handleEvent(event('preference', { payload: anonymous ? 'anonymous_true' : 'anonymous_false' }));
  harness.transport.reset();
}

const RESTART_TEXTS = [TEXT.restartHeader, TEXT.welcomeBody, TEXT.styleChoice];

describe('QuizFlowEngine', () => {
  test('begin greets the user and offers the two quiz styles', async () => {
    const { engine, transport, store } = createHarness();

    await expect(engine.handleEvent(event('begin'))).resolves.toEqual({ status: 'handled', state: 'selecting_preference' });

    expect(transport.texts).toEqual([`${TEXT.greeting('Ana')}\n\n${TEXT.welcomeBody}`, TEXT.styleChoice]);
    expect(transport.calls[1].options).toEqual({ parseMode: 'Markdown', keyboard: TEXT.styleButtons });
    expect(store.peek(USER)?.requestCount).toBe(1);
  });

  test('choosing a style edits the keyboard message and sends the template', async () => {
    const { engine, transport, store, audit } = createHarness();
    await engine.handleEvent(event('begin'));
    transport.reset();

    const outcome = await engine.handleEvent(event('preference', { payload: 'anonymous_false', sourceMessageId: 2 }));

    expect(outcome).toEqual({ status: 'handled', state: 'awaiting_payload' });
    expect(transport.calls.map((call) => call.method)).toEqual(['editMessage', 'sendMessage', 'sendMessage']);
    expect(transport.texts).toEqual([
      TEXT.preferenceSelected(false),
      JSON_TEMPLATE,
      TEXT.payloadInstructions(false),
    ]);
    expect(transport.calls[1].options).toBeUndefined();
    expect(store.peek(USER)).toMatchObject({ anonymous: false, state: 'awaiting_payload', requestCount: 2 });
    expect(audit.records.map((record) => record.kind)).toEqual(['preference_changed']);
  });

  test('a valid payload becomes one quiz poll per question and restarts', async () => {
    const harness = createHarness();
    await reachAwaitingPayload(harness);

    const outcome = await harness.engine.handleEvent(event('text', { payload: TWO_QUESTIONS }));

    expect(outcome).toEqual({
      status: 'handled',
      state: 'selecting_preference',
      submission: { result: 'delivered', total: 2, delivered: 2, errors: [] },
    });
    expect(harness.transport.polls).toEqual([
      { chatId: CHAT, question: 'Capital of Italy?', options: ['Rome', 'Milan', 'Turin'], correctOptionId: 0, anonymous: true, explanation: 'Rome' },
      { chatId: CHAT, question: '2+3?', options: ['4', '5'], correctOptionId: 1, anonymous: true },
    ]);
    expect(harness.transport.texts).toEqual([
      TEXT.processing,
      TEXT.validated(2, true),
      TEXT.completed(2, true),
      ...RESTART_TEXTS,
    ]);
    expect(harness.audit.records[harness.audit.records.length - 1]).toMatchObject({
      kind: 'payload_submitted',
      userId: USER,
      detail: { result: 'delivered', total: 2, delivered: 2, anonymous: true },
    });
  });

  test('a correct index equal to the option count sends an indexed error and no polls', async () => {
    const harness = createHarness();
    await reachAwaitingPayload(harness);
    const payload = JSON.stringify({ all_q: [{ q: 'Pick one', o: ['a', 'b'], c: 2 }] });

    const outcome = await harness.engine.handleEvent(event('text', { payload }));

    expect(outcome.status).toBe('handled');
    expect(outcome.state).toBe('selecting_preference');
    expect(outcome.submission?.result).toBe('validation_failed');
    expect(outcome.submission?.errors[0]).toMatchObject({ index: 1, code: 'correct_out_of_range' });
    expect(harness.transport.polls).toHaveLength(0);
    expect(harness.transport.texts).toEqual([
      TEXT.processing,
      TEXT.validationError("Question 1: correct answer 'c' must be between 0 and 1, got 2"),
      ...RESTART_TEXTS,
    ]);
    expect(harness.transport.calls[1]).toMatchObject({ method: 'editMessage', options: undefined });
  });

  test('undecodable text reports a format error', async () => {
    const harness = createHarness();
    await reachAwaitingPayload(harness);

    const outcome = await harness.engine.handleEvent(event('text', { payload: 'not json at all' }));

    expect(outcome.submission).toMatchObject({ result: 'decode_failed', total: 0, delivered: 0 });
    expect(harness.transport.texts.slice(0, 2)).toEqual([TEXT.processing, TEXT.decodeError]);
  });

  test('a rejected poll is reported as partial success', async () => {
    const harness = createHarness();
    await reachAwaitingPayload(harness);
    let polls = 0;
    harness.transport.respondPoll = async (request): Promise<TransportOutcome<SentPoll>> => {
      polls += 1;
      if (polls === 2) {
        return { kind: 'malformed', error: new Error('POLL_ANSWERS_INVALID') };
      }
      return { kind: 'ok', value: { chatId: request.chatId, messageId: 50 + polls, pollId: `p${polls}` } };
    };

    const outcome = await harness.engine.handleEvent(event('text', { payload: TWO_QUESTIONS }));

    expect(outcome.submission).toEqual({ result: 'partial', total: 2, delivered: 1, errors: [] });
    expect(harness.transport.texts[2]).toBe(TEXT.partial(1, 2));
  });

  test('the style preference survives the restart', async () => {
    const harness = createHarness();
    await reachAwaitingPayload(harness, false);
    await harness.engine.handleEvent(event('text', { payload: TWO_QUESTIONS }));

    expect(harness.transport.polls.every((poll) => poll.anonymous === false)).toBe(true);
    expect(harness.store.peek(USER)).toMatchObject({ anonymous: false, state: 'selecting_preference' });
  });

  test('text outside the payload step redirects to the start', async () => {
    const { engine, transport } = createHarness();

    const outcome = await engine.handleEvent(event('text', { payload: TWO_QUESTIONS }));

    expect(outcome).toEqual({ status: 'handled', state: 'selecting_preference' });
    expect(transport.texts).toEqual([
      TEXT.redirect,
      `${TEXT.greeting('Ana')}\n\n${TEXT.welcomeBody}`,
      TEXT.styleChoice,
    ]);
    expect(transport.polls).toHaveLength(0);
  });

  test('auxiliary commands answer without changing state', async () => {
    const harness = createHarness();
    await reachAwaitingPayload(harness);

    await harness.engine.handleEvent(event('help'));
    await harness.engine.handleEvent(event('quickstart'));
    await harness.engine.handleEvent(event('template'));
    await harness.engine.handleEvent(event('status'));
    const toggled = await harness.engine.handleEvent(event('toggle'));

    expect(toggled.state).toBe('awaiting_payload');
    expect(harness.transport.texts).toEqual([
      TEXT.help,
      TEXT.quickstart,
      TEXT.templateHeader,
      JSON_TEMPLATE,
      TEXT.templateHint,
      TEXT.status({ name: 'Ana', chatId: CHAT, anonymous: true, activeUsers: 1 }),
      TEXT.toggle(true),
    ]);
    expect(harness.transport.calls[6].options).toEqual({ parseMode: 'Markdown', keyboard: TEXT.toggleButtons });
  });

  test('a rate-limited user is told once per cooldown', async () => {
    const { engine, transport, health } = createHarness({
      rate: { short: { maxRequests: 1, windowMs: 60_000 }, long: { maxRequests: 1_000, windowMs: 3_600_000 }, cooldownMs: 300_000 },
    });
    await engine.handleEvent(event('help'));
    transport.reset();

    const denied = await engine.handleEvent(event('help'));
    const deniedAgain = await engine.handleEvent(event('help'));

    expect(denied).toEqual({ status: 'rate_limited', state: 'selecting_preference', retryAfterMs: 300_000 });
    expect(deniedAgain.status).toBe('rate_limited');
    expect(transport.texts).toEqual([TEXT.rateLimited(300)]);
    expect(health.recordRequest).toHaveBeenCalledTimes(1);
  });

  test('an unexpected error restarts the conversation', async () => {
    const texts: QuizTextConfig = {
      ...TEXT,
      status: () => {
        throw new Error('template exploded');
      },
    };
    const { engine, transport, health } = createHarness({ texts });

    const outcome = await engine.handleEvent(event('status'));

    expect(outcome).toEqual({ status: 'failed', state: 'selecting_preference' });
    expect(transport.texts).toEqual([TEXT.genericError, ...RESTART_TEXTS]);
    expect(health.recordError).toHaveBeenCalledWith('engine', new Error('template exploded'));
  });

  test('a timed-out submission leaves the state consistent and sends nothing more', async () => {
    const harness = createHarness({ eventTimeoutMs: 20 });
    await reachAwaitingPayload(harness);
    let releasePoll: () => void = () => undefined;
    harness.transport.respondPoll = (request) => new Promise<TransportOutcome<SentPoll>>((resolve) => {
      releasePoll = () => resolve({ kind: 'ok', value: { chatId: request.chatId, messageId: 70, pollId: 'slow' } });
    });

    const outcome = await harness.engine.handleEvent(event('text', { payload: TWO_QUESTIONS }));

    expect(outcome).toEqual({ status: 'timed_out', state: 'selecting_preference' });
    expect(harness.transport.calls.map((call) => call.method)).toEqual(['sendMessage', 'editMessage', 'sendQuizPoll']);

    releasePoll();
    await new Promise((resolve) => setTimeout(resolve, 10));
    expect(harness.transport.calls).toHaveLength(3);

    await expect(harness.engine.handleEvent(event('help'))).resolves.toEqual({ status: 'handled', state: 'selecting_preference' });
    expect(harness.transport.texts[harness.transport.texts.length - 1]).toBe(TEXT.help);
  });

  test('Markdown characters in the user name are escaped', async () => {
    const { engine, transport } = createHarness();

    await engine.handleEvent(event('begin', { firstName: 'a_b*c' }));
    await engine.handleEvent(event('status', { firstName: 'a_b*c' }));

    expect(transport.texts[0]).toBe(`👋 Hello **a\\_b\\*c**! 🌟\n\n${TEXT.welcomeBody}`);
    expect(transport.texts[2].split('\n')[2]).toBe('👤 **User:** a\\_b\\*c');
  });

  test('overlapping submissions from one user run one after the other', async () => {
    const harness = createHarness();
    await reachAwaitingPayload(harness);

    const [first, second] = await Promise.all([
      harness.engine.handleEvent(event('text', { payload: TWO_QUESTIONS })),
      harness.engine.handleEvent(event('text', { payload: TWO_QUESTIONS })),
    ]);

    expect(first.submission).toEqual({ result: 'delivered', total: 2, delivered: 2, errors: [] });
    expect(second).toEqual({ status: 'handled', state: 'selecting_preference' });
    expect(harness.transport.polls).toHaveLength(2);
    expect(harness.transport.texts.slice(-3)).toEqual([
      TEXT.redirect,
      `${TEXT.greeting('Ana')}\n\n${TEXT.welcomeBody}`,
      TEXT.styleChoice,
    ]);
  });

  test('a slow delivery for one user does not hold another user', async () => {
    const harness = createHarness();
    await reachAwaitingPayload(harness);
    let releasePoll: () => void = () => undefined;
    let signalPollSent: () => void = () => undefined;
    const pollSent = new Promise<void>((resolve) => {
      signalPollSent = resolve;
    });
    let held = false;
    harness.transport.respondPoll = (request): Promise<TransportOutcome<SentPoll>> => {
      const ok: TransportOutcome<SentPoll> = {
        kind: 'ok',
        value: { chatId: request.chatId, messageId: 80, pollId: `p-${request.question}` },
      };
      if (held) {
        return Promise.resolve(ok);
      }
      held = true;
      signalPollSent();
      return new Promise((resolve) => {
        releasePoll = () => resolve(ok);
      });
    };

    const submission = harness.engine.handleEvent(event('text', { payload: TWO_QUESTIONS }));
    await pollSent;
    const other = await harness.engine.handleEvent({ userId: 2, chatId: 20, firstName: 'Bia', kind: 'help' });

    expect(other).toEqual({ status: 'handled', state: 'selecting_preference' });
    expect(harness.transport.calls.filter((call) => call.chatId === 20).map((call) => call.text)).toEqual([TEXT.help]);
    expect(harness.transport.polls).toHaveLength(1);

    releasePoll();
    await expect(submission).resolves.toMatchObject({ submission: { result: 'delivered', delivered: 2 } });
  });
});
