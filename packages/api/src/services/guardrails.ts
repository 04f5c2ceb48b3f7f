import { GUARDRAIL_FLAGS, type GuardrailFlag } from '@statute-rag/shared';

/**
 * Answer Guardrails
 *
 * Screens generated answer text for wording that reads as personal legal
 * advice or a promised outcome, for sensitive topics, and for personal
 * identifiers. Identifiers are redacted; the other checks append a notice.
 * Matching is regex-only and never calls a model.
 */

export interface GuardrailReview {
  text: string;
  flags: GuardrailFlag[];
}

type ScreenedFlag = Exclude<GuardrailFlag, 'personal-data'>;

const SCREENED_FLAGS: readonly ScreenedFlag[] = ['legal-advice', 'outcome-prediction', 'sensitive-topic'];

const PATTERNS: Record<ScreenedFlag, RegExp[]> = {
  'legal-advice': [
    /\byou should\b/i,
    /\byou must\b/i,
    /\byou need to\b/i,
    /\bi (?:recommend|suggest|advise)\b/i,
    /\bmy advice\b/i,
    /\bfile an? (?:\w+ )?(?:case|suit|complaint)\b/i,
    /\bsue\b.*\bfor\b/i,
    /\bapproach\b.*\bcourt\b/i,
  ],
  'outcome-prediction': [
    /\byou will\b.*\b(?:win|lose)\b/i,
    /\byour case\b.*\b(?:strong|weak)\b/i,
    /\bguaranteed\b/i,
    /\bdefinitely\b.*\bget\b/i,
  ],
  'sensitive-topic': [
    /\bdomestic violence\b/i,
    /\bchild abuse\b/i,
    /\bsexual assault\b/i,
    /\bsuicide\b/i,
    /\bself-harm\b/i,
    /\bmedical emergency\b/i,
  ],
};

const EMAIL = /\b[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}\b/g;
// Ten or more digits: phone and national id numbers.
const LONG_NUMBER = /\b\d{10,}\b/g;

export const ADVICE_DISCLAIMER =
  'Disclaimer: This answer is general information drawn from statutory text, not legal advice. ' +
  'Consult a qualified lawyer about your own situation.';

export const SAFETY_NOTICE =
  'If you or someone else is in danger, contact local emergency services or a support helpline now.';

function redact(text: string): string {
  return text.replace(EMAIL, '[REDACTED EMAIL]').replace(LONG_NUMBER, '[REDACTED NUMBER]');
}

export function reviewAnswer(text: string): GuardrailReview {
  const tripped = new Set<GuardrailFlag>();
  for (const flag of SCREENED_FLAGS) {
    if (PATTERNS[flag].some((pattern) => pattern.test(text))) {
      tripped.add(flag);
    }
  }

  let reviewed = redact(text);
  if (reviewed !== text) {
    tripped.add('personal-data');
  }

  if (tripped.has('legal-advice') || tripped.has('outcome-prediction')) {
    reviewed = `${reviewed}\n\n${ADVICE_DISCLAIMER}`;
  }
  if (tripped.has('sensitive-topic')) {
    reviewed = `${reviewed}\n\n${SAFETY_NOTICE}`;
  }

  return { text: reviewed, flags: GUARDRAIL_FLAGS.filter((flag) => tripped.has(flag)) };
}
