export type QuestionTopic = 'availability' | 'performance' | 'security' | 'errors' | 'identity' | 'general';

const includesAny = (text: string, words: string[]) => words.some((word) => text.includes(word));

// First match wins; plain substring matching ("optimiz" covers optimize/optimization)
export function classifyQuestion(question: string): QuestionTopic {
  const q = question.toLowerCase();

  if (includesAny(q, ['availability', 'improve', 'optimiz'])) return 'availability';
  if (includesAny(q, ['slow', 'performance'])) return 'performance';
  if (includesAny(q, ['secure', 'security', 'safe', 'trust', 'certificate'])) return 'security';
  if (includesAny(q, ['error', 'issue', 'problem'])) return 'errors';
  if (q.includes('what') && includesAny(q, ['use', 'purpose', 'is'])) return 'identity';
  return 'general';
}
