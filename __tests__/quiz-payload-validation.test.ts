import {
  DEFAULT_VALIDATION_LIMITS,
  FIELD_KEYS,
  resolveField,
  validateQuizPayload,
} from '../src/validation/quizPayload';

function payload(questions: unknown[]): string {
  return JSON.stringify({ all_q: questions });
}

describe('validateQuizPayload', () => {
  test('accepts short keys and keeps the optional explanation', () => {
    const result = validateQuizPayload(payload([
      { q: 'Capital of Italy?', o: ['Rome', 'Milan'], c: 0, e: 'Rome since 1871' },
      { q: '1+1?', o: ['1', '2', '3'], c: 1 },
    ]));

    expect(result).toEqual({
      ok: true,
      questions: [
        { question: 'Capital of Italy?', options: ['Rome', 'Milan'], correctOptionId: 0, explanation: 'Rome since 1871' },
        { question: '1+1?', options: ['1', '2', '3'], correctOptionId: 1 },
      ],
    });
  });

  test('accepts the long key aliases', () => {
    const result = validateQuizPayload(JSON.stringify({
      all_questions: [{ question: 'Largest ocean?', options: ['Atlantic', 'Pacific'], correct_option_id: 1, explanation: 'By area' }],
    }));

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.questions[0]).toEqual({
        question: 'Largest ocean?',
        options: ['Atlantic', 'Pacific'],
        correctOptionId: 1,
        explanation: 'By area',
      });
    }
  });

  test('treats a zero correct index as present', () => {
    const result = validateQuizPayload(payload([{ q: 'Pick A', o: ['A', 'B'], c: 0 }]));
    expect(result.ok).toBe(true);
  });

  test('reports malformed JSON as a decode failure', () => {
    const result = validateQuizPayload('{"all_q": [');
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.kind).toBe('decode');
      expect(result.errors).toHaveLength(1);
      expect(result.errors[0].code).toBe('invalid_json');
      expect(result.errors[0].index).toBeUndefined();
    }
  });

  test('rejects a top-level array as a structural failure', () => {
    const result = validateQuizPayload('[1, 2]');
    expect(result).toEqual({
      ok: false,
      kind: 'validation',
      errors: [{ code: 'not_an_object', message: 'Payload must be a JSON object with an "all_q" list' }],
    });
  });

  test('an empty question list means no questions', () => {
    const result = validateQuizPayload(payload([]));
    expect(result).toEqual({
      ok: false,
      kind: 'validation',
      errors: [{ code: 'no_questions', message: 'No questions found' }],
    });
  });

  test('rejects more questions than the limit', () => {
    const questions = Array.from({ length: 3 }, () => ({ q: 'x', o: ['a', 'b'], c: 0 }));
    const result = validateQuizPayload(payload(questions), { ...DEFAULT_VALIDATION_LIMITS, maxQuestions: 2 });
    expect(result).toEqual({
      ok: false,
      kind: 'validation',
      errors: [{ code: 'too_many_questions', message: 'Too many questions: 3 (maximum 2)' }],
    });
  });

  test('a correct index equal to the option count names the question', () => {
    const result = validateQuizPayload(payload([
      { q: 'ok', o: ['a', 'b'], c: 1 },
      { q: 'broken', o: ['a', 'b', 'c'], c: 3 },
    ]));
    expect(result).toEqual({
      ok: false,
      kind: 'validation',
      errors: [{
        index: 2,
        code: 'correct_out_of_range',
        message: "Question 2: correct answer 'c' must be between 0 and 2, got 3",
      }],
    });
  });

  test.each([
    [{ o: ['a', 'b'], c: 0 }, 'missing_question', 'Question 1: question text is missing'],
    [{ q: '   ', o: ['a', 'b'], c: 0 }, 'missing_question', 'Question 1: question text is missing'],
    [{ q: 'x', c: 0 }, 'missing_options', 'Question 1: options are missing'],
    [{ q: 'x', o: 'a,b', c: 0 }, 'options_not_list', 'Question 1: options must be a list'],
    [{ q: 'x', o: ['a'], c: 0 }, 'option_count', 'Question 1: expected 2-10 options, got 1'],
    [{ q: 'x', o: ['a', 2], c: 0 }, 'invalid_option', 'Question 1: option 2 must be a non-empty text'],
    [{ q: 'x', o: ['a', 'b'] }, 'missing_correct', "Question 1: correct answer 'c' is missing"],
    [{ q: 'x', o: ['a', 'b'], c: '1' }, 'correct_not_integer', "Question 1: correct answer 'c' must be a whole number"],
    [{ q: 'x', o: ['a', 'b'], c: 0.5 }, 'correct_not_integer', "Question 1: correct answer 'c' must be a whole number"],
    [{ q: 'x', o: ['a', 'b'], c: -1 }, 'correct_out_of_range', "Question 1: correct answer 'c' must be between 0 and 1, got -1"],
    [{ q: 'x', o: ['a', 'b'], c: 0, e: 42 }, 'invalid_explanation', 'Question 1: explanation must be a text'],
    ['plain text', 'invalid_question', 'Question 1: must be an object'],
  ])('rejects %j with %s', (question, code, message) => {
    const result = validateQuizPayload(payload([question]));
    expect(result).toEqual({ ok: false, kind: 'validation', errors: [{ index: 1, code, message }] });
  });

  test('enforces text length limits', () => {
    const limits = { ...DEFAULT_VALIDATION_LIMITS, maxQuestionLength: 5, maxOptionLength: 3, maxExplanationLength: 4 };

    const longQuestion = validateQuizPayload(payload([{ q: 'abcdef', o: ['a', 'b'], c: 0 }]), limits);
    expect(!longQuestion.ok && longQuestion.errors[0].code).toBe('question_too_long');

    const longOption = validateQuizPayload(payload([{ q: 'abc', o: ['a', 'bcde'], c: 0 }]), limits);
    expect(!longOption.ok && longOption.errors[0].message).toBe('Question 1: option 2 is longer than 3 characters');

    const longExplanation = validateQuizPayload(payload([{ q: 'abc', o: ['a', 'b'], c: 0, e: 'abcde' }]), limits);
    expect(!longExplanation.ok && longExplanation.errors[0].code).toBe('explanation_too_long');
  });
});

describe('resolveField', () => {
  test('returns the first non-empty candidate', () => {
    expect(resolveField({ q: '', question: 'Fallback?' }, FIELD_KEYS.question)).toBe('Fallback?');
  });

  test('returns undefined when no candidate is set', () => {
    expect(resolveField({ other: 'x' }, FIELD_KEYS.options)).toBeUndefined();
  });
});
