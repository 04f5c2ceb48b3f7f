import { describe, it, expect } from 'vitest';
import { classifyIntent, quickReply } from './intent';

describe('classifyIntent', () => {
  it.each([
    ['hello there', 'greeting'],
    ['Good morning!', 'greeting'],
    ['ok bye', 'goodbye'],
    ['see you tomorrow', 'goodbye'],
    ['thank you so much', 'thanks'],
    ['how are you?', 'chitchat'],
    ['That was awesome', 'feedback'],
    ['you’re helpful', 'feedback'],
  ] as const)('classifies %j as %s', (text, intent) => {
    expect(classifyIntent(text)).toBe(intent);
  });

  it('lets a legal keyword win over small talk', () => {
    expect(classifyIntent('hi, what does section 3 say?')).toBe('legal');
    expect(classifyIntent('thanks, and what is the limitation period?')).toBe('legal');
  });

  it.each([
    'Hi, what is the punishment for theft?',
    'Thanks, and how long is bail valid?',
    'hey can I get bail after an arrest',
    'Good morning, the landlord kept my deposit and will not return it',
  ])('routes the question in %j to retrieval despite the small talk', (text) => {
    expect(classifyIntent(text)).toBe('legal');
  });

  it('keeps small talk with a few extra words conversational', () => {
    expect(classifyIntent('hi again')).toBe('greeting');
    expect(classifyIntent('thanks a lot!')).toBe('thanks');
  });

  it('matches whole words only', () => {
    expect(classifyIntent('think about this')).toBe('legal');
    expect(classifyIntent('they acted in haste')).toBe('legal');
  });

  it('treats anything unrecognised as a legal question', () => {
    expect(classifyIntent('can my landlord keep the deposit')).toBe('legal');
  });
});

describe('quickReply', () => {
  it('has no reply for legal questions', () => {
    expect(quickReply('legal')).toBeNull();
  });

  it('answers thanks with a fixed reply', () => {
    expect(quickReply('thanks')).toBe("You're welcome! If you have more legal questions, I'm here to help.");
  });
});
