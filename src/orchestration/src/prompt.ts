/**
 * Context assembler
 * Merges retrieved chunks and the weather snapshot into a single prompt under
 * a character budget. Chunks are added nearest-first and the first one that
 * does not fit ends the list, so the included chunks are always a prefix of
 * the ranking. Citations are derived from the included chunks only.
 */

import { Citation, Prompt, RetrievalResult, ScoredChunk, WeatherSnapshot } from './types';

export const INSTRUCTION =
  "You are an agricultural assistant. Answer the farmer's question clearly and practically, " +
  'using only the context below. Refer to context passages by their number, e.g. [1]. ' +
  "If the context does not contain the answer, say that you don't have that information.";

export interface PromptInput {
  question: string;
  results: RetrievalResult;
  weather: WeatherSnapshot | null;
  maxChars: number;
}

function formatChunk(result: ScoredChunk, index: number): string {
  const { chunk } = result;
  return `[${index + 1}] (Source: ${chunk.sourceFile}, page ${chunk.pageNumber})\n${chunk.text}`;
}

export function formatWeatherSection(weather: WeatherSnapshot): string {
  const lines = [
    `Current weather in ${weather.location} (${weather.timestamp.toISOString()}):`,
    `Temperature: ${weather.temperature}°C`
  ];
  if (weather.humidity !== undefined) {
    lines.push(`Humidity: ${weather.humidity}%`);
  }
  lines.push(`Conditions: ${weather.conditions}`);
  lines.push(`Precipitation: ${weather.precipitation} mm`);
  return lines.join('\n');
}

function render(question: string, chunks: ScoredChunk[], weather: WeatherSnapshot | null): string {
  const sections = [INSTRUCTION];

  if (chunks.length > 0) {
    sections.push(`Context:\n\n${chunks.map(formatChunk).join('\n\n')}`);
  } else {
    sections.push('Context:\n\nNo relevant documents were found.');
  }

  if (weather) {
    sections.push(formatWeatherSection(weather));
  }

  sections.push(`Question: ${question}`);
  sections.push('Answer:');

  return sections.join('\n\n');
}

export function citationsFor(chunks: ScoredChunk[]): Citation[] {
  return chunks.map(({ chunk }) => ({ sourceFile: chunk.sourceFile, pageNumber: chunk.pageNumber }));
}

/**
 * Build the prompt, dropping the lowest-ranked chunks first when over budget
 * The instruction, weather and question are always kept.
 */
export function buildPrompt(input: PromptInput): Prompt {
  const { question, results, weather, maxChars } = input;

  let included: ScoredChunk[] = [];
  for (let i = 0; i < results.length; i++) {
    const candidate = results.slice(0, i + 1);
    if (render(question, candidate, weather).length > maxChars) {
      break;
    }
    included = candidate;
  }

  return {
    text: render(question, included, weather),
    includedChunks: included,
    droppedChunks: results.length - included.length,
    citations: citationsFor(included),
    hasWeatherSection: weather !== null
  };
}
