import type { Variable } from '../types/coding.types.js';

const PLACEHOLDER = /\{(content|variables)\}/g;

/**
 * Likert labels padded with ordinal numbers up to the scale size
 */
export function likertScaleLabels(scale: number, labels: readonly string[] = []): string[] {
  const padded = labels.slice(0, scale);
  for (let point = padded.length + 1; point <= scale; point++) {
    padded.push(String(point));
  }
  return padded;
}

export function describeVariable(variable: Variable): string {
  let text = `${variable.name} (${variable.kind})`;

  switch (variable.kind) {
    case 'categorical':
      text += ` [options: ${variable.options.join(', ')}]`;
      break;
    case 'likert':
      text += variable.likertLabels && variable.likertLabels.length > 0
        ? ` [scale: ${likertScaleLabels(variable.likertScale, variable.likertLabels).join(', ')}]`
        : ` [scale: 1-${variable.likertScale}]`;
      break;
    case 'numeric':
    case 'text':
      break;
  }

  if (variable.guide) {
    text += `\nCoding guide: ${variable.guide}`;
  }

  return `${text}\n\n`;
}

export function buildVariablesText(variables: readonly Variable[]): string {
  return variables.map(describeVariable).join('');
}

/**
 * Fill {content} and {variables} in one pass, so placeholder-like text
 * inside the content is never substituted again.
 */
export function renderPrompt(template: string, content: string, variablesText: string): string {
  return template.replace(PLACEHOLDER, (_match, name: string) => (name === 'content' ? content : variablesText));
}

/**
 * mm:ss (Ns) label for a frame timestamp
 */
export function formatTimestamp(seconds: number): string {
  const whole = Math.max(0, Math.floor(seconds));
  const minutes = Math.floor(whole / 60);
  const rest = whole % 60;
  return `${String(minutes).padStart(2, '0')}:${String(rest).padStart(2, '0')} (${whole}s)`;
}
