import type { ScoreData } from './scoring';
import { valueToLetter } from './grades';

interface ExportResultsOptions {
  scoreData: ScoreData;
  heading: string; // First line of the block, e.g. "<app title> Results"
  t: (key: string) => string; // Translation function (common namespace)
}

// Indicator scores are whole grades; criterion and value scores are means.
export const formatScore = (score: number, whole = false): string =>
  whole ? String(score) : score.toFixed(2);

/**
 * Builds the plain-text results block offered for copying:
 * one "- name: score (Grade: X)" line per score, grouped by layer.
 * Layers without scores are left out.
 */
export const generateResultsText = ({ scoreData, heading, t }: ExportResultsOptions): string => {
  const sections: Array<{ title: string; scores: Record<string, number>; whole: boolean }> = [
    { title: t('summary.valueScores'), scores: scoreData.valueScores, whole: false },
    { title: t('summary.criterionScores'), scores: scoreData.criterionScores, whole: false },
    { title: t('summary.indicatorScores'), scores: scoreData.indicatorScores, whole: true }
  ];

  let text = `${heading}\n\n`;
  sections.forEach(({ title, scores, whole }) => {
    const entries = Object.entries(scores);
    if (entries.length === 0) return;
    text += `${title}:\n`;
    entries.forEach(([name, score]) => {
      text += `- ${name}: ${formatScore(score, whole)} (Grade: ${valueToLetter(score)})\n`;
    });
    text += '\n';
  });

  return text;
};

/**
 * Copies text using the Clipboard API where available, falling back to a hidden
 * textarea and execCommand. Resolves to whether the text was copied.
 */
export const copyTextToClipboard = async (text: string): Promise<boolean> => {
  if (navigator.clipboard?.writeText && window.isSecureContext) {
    await navigator.clipboard.writeText(text);
    return true;
  }

  const textarea = document.createElement('textarea');
  textarea.value = text;
  textarea.setAttribute('readonly', 'true');
  textarea.style.position = 'fixed';
  textarea.style.left = '-9999px';
  document.body.appendChild(textarea);
  textarea.select();

  let copied = false;
  try {
    copied = document.execCommand('copy');
  } catch {
    copied = false;
  }

  document.body.removeChild(textarea);
  return copied;
};

// "questionnaire-answers-2025-02-03.json" (UTC date)
export const backupFileName = (date: Date): string =>
  `questionnaire-answers-${date.toISOString().slice(0, 10)}.json`;

/**
 * Downloads the answers backup as a JSON file
 */
export const downloadJSON = (json: string, fileName: string): void => {
  const blob = new Blob([json], { type: 'application/json' });
  const url = URL.createObjectURL(blob);
  const a = document.createElement('a');
  a.href = url;
  a.download = fileName;
  a.click();
  URL.revokeObjectURL(url);
};
