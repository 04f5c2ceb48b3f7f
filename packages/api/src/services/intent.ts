/**
 * Intent Router
 *
 * Keyword classifier that keeps purely conversational messages ("hi",
 * "thanks") away from retrieval. A message is legal when it holds a legal
 * keyword, or when what is left after removing its conversational phrases
 * still reads as a question. Anything unrecognised is treated as legal.
 */

export type Intent = 'greeting' | 'goodbye' | 'thanks' | 'chitchat' | 'feedback' | 'legal';

type ConversationalIntent = Exclude<Intent, 'legal'>;

// Checked in this order; the first match wins.
const CONVERSATIONAL_INTENTS: readonly ConversationalIntent[] = ['greeting', 'goodbye', 'thanks', 'chitchat', 'feedback'];

const LEGAL_KEYWORDS = [
  'section',
  'act',
  'law',
  'statute',
  'procedure',
  'legal',
  'court',
  'case',
  'article',
  'limitation',
  'contract',
];

const CONVERSATIONAL_KEYWORDS: Record<ConversationalIntent, string[]> = {
  greeting: ['hi', 'hello', 'hey', 'good morning', 'good evening'],
  goodbye: ['bye', 'goodbye', 'see you', 'take care'],
  thanks: ['thanks', 'thank you', 'much appreciated'],
  chitchat: ["what's up", 'how are you', 'lol', 'cool', 'great', 'nice'],
  feedback: ["you're helpful", 'good answer', 'awesome', 'love it'],
};

const QUESTION_WORDS = [
  'what',
  'how',
  'when',
  'where',
  'why',
  'which',
  'who',
  'whom',
  'whose',
  'can',
  'could',
  'should',
  'may',
  'must',
  'is',
  'are',
  'does',
  'do',
  'did',
  'will',
  'would',
  'explain',
  'define',
];

// More leftover words than this is a question rather than small talk.
const MAX_SMALL_TALK_WORDS = 3;

const QUICK_REPLIES: Record<ConversationalIntent, string> = {
  greeting: "Hello! I'm a statute research assistant. What would you like to know about the law?",
  goodbye: 'Goodbye! Come back any time you have a legal question.',
  thanks: "You're welcome! If you have more legal questions, I'm here to help.",
  chitchat: "I'm doing well, thanks for asking! Ask me about any statute or section.",
  feedback: 'Thank you for the feedback!',
};

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function toMatcher(keywords: readonly string[]): RegExp {
  return new RegExp(`\\b(?:${keywords.map(escapeRegExp).join('|')})\\b`, 'i');
}

const legalMatcher = toMatcher(LEGAL_KEYWORDS);
const questionMatcher = toMatcher(QUESTION_WORDS);
const conversationalMatchers = CONVERSATIONAL_INTENTS.map(
  (intent) => [intent, toMatcher(CONVERSATIONAL_KEYWORDS[intent])] as const
);
const allConversational = new RegExp(
  toMatcher(CONVERSATIONAL_INTENTS.flatMap((intent) => CONVERSATIONAL_KEYWORDS[intent])).source,
  'gi'
);

/**
 * True when the text left after removing conversational phrases asks
 * something: a question word, a question mark, or too many words.
 */
function hasQuestion(text: string): boolean {
  const rest = text.replace(allConversational, ' ');
  const words = rest.match(/[a-z0-9']+/gi) ?? [];
  if (words.length === 0) {
    return false;
  }
  return rest.includes('?') || questionMatcher.test(rest) || words.length > MAX_SMALL_TALK_WORDS;
}

export function classifyIntent(text: string): Intent {
  const normalized = text.replace(/’/g, "'");
  if (legalMatcher.test(normalized)) {
    return 'legal';
  }
  const intent = conversationalMatchers.find(([, matcher]) => matcher.test(normalized))?.[0];
  if (!intent || hasQuestion(normalized)) {
    return 'legal';
  }
  return intent;
}

/**
 * Fixed reply for a conversational intent, or null for a legal question.
 */
export function quickReply(intent: Intent): string | null {
  return intent === 'legal' ? null : QUICK_REPLIES[intent];
}
