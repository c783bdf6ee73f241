export interface QuestionRecord {
  readonly question: string;
  readonly options: readonly string[];
  readonly correctOptionId: number;
  readonly explanation?: string;
}

export interface ValidationLimits {
  readonly maxQuestions: number;
  readonly maxQuestionLength: number;
  readonly minOptions: number;
  readonly maxOptions: number;
  readonly maxOptionLength: number;
  readonly maxExplanationLength: number;
}

/**
 * O texto de ajuda anuncia 2–4 opções, mas o validador aceita até 10.
 * Mantido assim até decisão de produto (ver DESIGN.md).
 */
export const DEFAULT_VALIDATION_LIMITS: ValidationLimits = Object.freeze({
  maxQuestions: 50,
  maxQuestionLength: 300,
  minOptions: 2,
  maxOptions: 10,
  maxOptionLength: 100,
  maxExplanationLength: 200,
});

/**
 * Chaves aceitas por campo, em ordem de prioridade. Payloads antigos usam
 * nomes longos; o template atual usa as abreviações.
 */
export const FIELD_KEYS = {
  questions: ['all_q', 'q', 'all_questions'],
  question: ['q', 'question'],
  options: ['o', 'options'],
  correct: ['c', 'correct', 'correct_option_id'],
  explanation: ['e', 'explanation'],
} as const satisfies Record<string, readonly string[]>;

export type ValidationErrorCode =
  | 'invalid_json'
  | 'not_an_object'
  | 'no_questions'
  | 'questions_not_list'
  | 'too_many_questions'
  | 'invalid_question'
  | 'missing_question'
  | 'question_too_long'
  | 'missing_options'
  | 'options_not_list'
  | 'option_count'
  | 'invalid_option'
  | 'option_too_long'
  | 'missing_correct'
  | 'correct_not_integer'
  | 'correct_out_of_range'
  | 'invalid_explanation'
  | 'explanation_too_long';

export interface ValidationIssue {
  /** Posição 1-based da pergunta, ausente para erros do payload inteiro. */
  readonly index?: number;
  readonly code: ValidationErrorCode;
  readonly message: string;
}

export type PayloadValidationResult =
  | { readonly ok: true; readonly questions: readonly QuestionRecord[] }
  | { readonly ok: false; readonly kind: 'decode' | 'validation'; readonly errors: readonly ValidationIssue[] };

type RawRecord = Readonly<Record<string, unknown>>;

type Presence = (value: unknown) => boolean;

const isNonEmpty: Presence = (value) => {
  if (value === null || value === undefined) {
    return false;
  }
  if (typeof value === 'string' || Array.isArray(value)) {
    return value.length > 0;
  }
  return true;
};

const isDefined: Presence = (value) => value !== null && value !== undefined;

function isRecord(value: unknown): value is RawRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Retorna o valor da primeira chave candidata considerada presente.
 * `undefined` significa "não definido" em todas as chaves.
 */
export function resolveField(
  record: RawRecord,
  keys: readonly string[],
  isPresent: Presence = isNonEmpty,
): unknown {
  for (const key of keys) {
    const value = record[key];
    if (isPresent(value)) {
      return value;
    }
  }
  return undefined;
}

function fail(kind: 'decode' | 'validation', issue: ValidationIssue): PayloadValidationResult {
  return { ok: false, kind, errors: [issue] };
}

function issue(code: ValidationErrorCode, message: string, index?: number): ValidationIssue {
  return index === undefined ? { code, message } : { index, code, message: `Question ${index}: ${message}` };
}

type QuestionCheck = { readonly ok: true; readonly record: QuestionRecord } | { readonly ok: false; readonly issue: ValidationIssue };

function validateQuestion(raw: unknown, index: number, limits: ValidationLimits): QuestionCheck {
  if (!isRecord(raw)) {
    return { ok: false, issue: issue('invalid_question', 'must be an object', index) };
  }

  const text = resolveField(raw, FIELD_KEYS.question);
  if (typeof text !== 'string' || text.trim().length === 0) {
    return { ok: false, issue: issue('missing_question', 'question text is missing', index) };
  }
  if (text.length > limits.maxQuestionLength) {
    return {
      ok: false,
      issue: issue('question_too_long', `question text is longer than ${limits.maxQuestionLength} characters`, index),
    };
  }

  const options = resolveField(raw, FIELD_KEYS.options);
  if (options === undefined) {
    return { ok: false, issue: issue('missing_options', 'options are missing', index) };
  }
  if (!Array.isArray(options)) {
    return { ok: false, issue: issue('options_not_list', 'options must be a list', index) };
  }
  if (options.length < limits.minOptions || options.length > limits.maxOptions) {
    return {
      ok: false,
      issue: issue(
        'option_count',
        `expected ${limits.minOptions}-${limits.maxOptions} options, got ${options.length}`,
        index,
      ),
    };
  }
  const optionTexts: string[] = [];
  for (let position = 0; position < options.length; position += 1) {
    const option: unknown = options[position];
    if (typeof option !== 'string' || option.length === 0) {
      return { ok: false, issue: issue('invalid_option', `option ${position + 1} must be a non-empty text`, index) };
    }
    if (option.length > limits.maxOptionLength) {
      return {
        ok: false,
        issue: issue('option_too_long', `option ${position + 1} is longer than ${limits.maxOptionLength} characters`, index),
      };
    }
    optionTexts.push(option);
  }

  const correct = resolveField(raw, FIELD_KEYS.correct, isDefined);
  if (correct === undefined) {
    return { ok: false, issue: issue('missing_correct', "correct answer 'c' is missing", index) };
  }
  if (typeof correct !== 'number' || !Number.isInteger(correct)) {
    return { ok: false, issue: issue('correct_not_integer', "correct answer 'c' must be a whole number", index) };
  }
  if (correct < 0 || correct >= optionTexts.length) {
    return {
      ok: false,
      issue: issue(
        'correct_out_of_range',
        `correct answer 'c' must be between 0 and ${optionTexts.length - 1}, got ${correct}`,
        index,
      ),
    };
  }

  const explanation = resolveField(raw, FIELD_KEYS.explanation);
  if (explanation !== undefined && typeof explanation !== 'string') {
    return { ok: false, issue: issue('invalid_explanation', 'explanation must be a text', index) };
  }
  if (typeof explanation === 'string' && explanation.length > limits.maxExplanationLength) {
    return {
      ok: false,
      issue: issue('explanation_too_long', `explanation is longer than ${limits.maxExplanationLength} characters`, index),
    };
  }

  const record: QuestionRecord = typeof explanation === 'string'
    ? { question: text, options: optionTexts, correctOptionId: correct, explanation }
    : { question: text, options: optionTexts, correctOptionId: correct };
  return { ok: true, record };
}

/**
 * Decodifica e valida o JSON enviado pelo usuário. Função pura: a primeira
 * pergunta inválida interrompe o lote inteiro.
 */
export function validateQuizPayload(
  rawPayload: string,
  limits: ValidationLimits = DEFAULT_VALIDATION_LIMITS,
): PayloadValidationResult {
  let decoded: unknown;
  try {
    decoded = JSON.parse(rawPayload.trim());
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    return fail('decode', issue('invalid_json', `Payload is not valid JSON (${reason})`));
  }

  if (!isRecord(decoded)) {
    return fail('validation', issue('not_an_object', 'Payload must be a JSON object with an "all_q" list'));
  }

  const questions = resolveField(decoded, FIELD_KEYS.questions);
  if (questions === undefined) {
    return fail('validation', issue('no_questions', 'No questions found'));
  }
  if (!Array.isArray(questions)) {
    return fail('validation', issue('questions_not_list', 'Questions must be a list'));
  }
  if (questions.length > limits.maxQuestions) {
    return fail(
      'validation',
      issue('too_many_questions', `Too many questions: ${questions.length} (maximum ${limits.maxQuestions})`),
    );
  }

  const records: QuestionRecord[] = [];
  for (let position = 0; position < questions.length; position += 1) {
    const checked = validateQuestion(questions[position], position + 1, limits);
    if (!checked.ok) {
      return fail('validation', checked.issue);
    }
    records.push(checked.record);
  }
  return { ok: true, questions: records };
}
