export const FIRST_PERSON_PROMPT = [
  'Describe what you see in this image from a first-person perspective,',
  'as if you are a companion looking through your own camera.',
  "Start with 'I can see' or 'I notice' and describe the scene naturally.",
  'Keep it concise, around 1-2 sentences.'
].join(' ');

export const PLAIN_PROMPT = 'Describe what you see in this image concisely.';

export function buildPrompt(firstPerson: boolean): string {
  return firstPerson ? FIRST_PERSON_PROMPT : PLAIN_PROMPT;
}
