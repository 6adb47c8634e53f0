export function buildRagPrompt(query: string, context: string): string {
  return [
    'Use the context below to answer the user query.',
    '',
    'Context:',
    context,
    '',
    'User Query:',
    query,
    '',
    'Answer:',
  ].join('\n');
}
