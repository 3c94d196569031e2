/**
 * Question answering pipeline
 * 1. Retrieve the nearest chunks and (optionally) fetch weather, concurrently
 * 2. Assemble a bounded prompt with numbered, cited passages
 * 3. Ask the language model
 * 4. Return the answer with citations for the passages that were sent
 *
 * Failures are returned as outcomes, never thrown: weather problems degrade
 * the answer, while retrieval or model errors and an over-long question fail
 * the single query.
 */

import * as fs from 'fs';
import * as path from 'path';
import { AnswerOutcome, AppConfig, Citation, Query, RetrievalResult, WeatherLookup } from './types';
import { Retriever } from './retriever';
import { WeatherClient, WeatherFetcher } from './weather';
import { GroqLanguageModel, LanguageModel } from './languageModel';
import { buildPrompt } from './prompt';
import { createEmbedder } from './embeddings';
import { VectorStore } from './vectorStore';
import { describeError } from './errors';
import { logger } from './logger';

export interface AssistantContext {
  retriever: Retriever;
  weather: WeatherFetcher;
  model: LanguageModel;
  maxPromptChars: number;
  defaultLocation: string;
}

/**
 * Wire the production collaborators from configuration
 */
export function createAssistantContext(config: AppConfig, store: VectorStore): AssistantContext {
  const embedder = createEmbedder(config.embedding);

  return {
    retriever: new Retriever(store, embedder, config.topK),
    weather: new WeatherClient({ timeoutMs: config.weatherTimeoutMs }),
    model: new GroqLanguageModel(config.groq),
    maxPromptChars: config.maxPromptChars,
    defaultLocation: config.defaultLocation
  };
}

export function formatCitation(citation: Citation): string {
  return `Document: ${citation.sourceFile}, Page: ${citation.pageNumber}`;
}

/**
 * Answer one question
 */
export async function answerQuestion(input: Query, context: AssistantContext): Promise<AnswerOutcome> {
  logger.section('Answering Question');

  const question = input.question.trim();
  const location = (input.location ?? context.defaultLocation).trim();
  const query: Query = { ...input, question, location };

  if (!question) {
    return { status: 'failed', query, reason: 'Please enter a question first.' };
  }

  logger.info(`Question: "${question}"`);
  logger.info(`Weather: ${query.weatherEnabled ? location : 'off'}`);

  const startTime = Date.now();

  let results: RetrievalResult;
  let lookup: WeatherLookup | null;
  try {
    [results, lookup] = await Promise.all([
      context.retriever.retrieve(question, query.topK),
      query.weatherEnabled ? context.weather.fetchWeather(location) : Promise.resolve(null)
    ]);
  } catch (error) {
    logger.error('Retrieval failed', error);
    return { status: 'failed', query, reason: `Retrieval failed: ${describeError(error)}` };
  }

  const weather = lookup?.status === 'available' ? lookup.snapshot : null;
  const prompt = buildPrompt({
    question,
    results,
    weather,
    maxChars: context.maxPromptChars
  });

  if (prompt.text.length > context.maxPromptChars) {
    return {
      status: 'failed',
      query,
      reason: `Question is too long: the prompt needs ${prompt.text.length} characters, the limit is ${context.maxPromptChars}`
    };
  }

  if (prompt.droppedChunks > 0) {
    logger.warn(`Dropped ${prompt.droppedChunks} lower-ranked chunks to fit ${context.maxPromptChars} characters`);
  }
  logger.debug('Prompt:', prompt.text);

  let text: string;
  try {
    text = await context.model.generate(prompt.text);
  } catch (error) {
    return { status: 'failed', query, reason: describeError(error) };
  }

  const answer = { text: text.trim(), citations: prompt.citations };
  const duration = ((Date.now() - startTime) / 1000).toFixed(2);
  logger.success(`Answered in ${duration}s with ${answer.citations.length} citations`);

  if (lookup?.status === 'unavailable') {
    return { status: 'degraded', query, answer, weather: null, reason: lookup.reason };
  }

  return { status: 'ok', query, answer, weather };
}

/**
 * Save an answer as JSON (question, answer, sources, weather, location)
 */
export function saveAnswer(outcome: AnswerOutcome, outputPath: string): void {
  logger.info(`Saving answer to: ${outputPath}`);

  const outputDir = path.dirname(outputPath);
  if (!fs.existsSync(outputDir)) {
    fs.mkdirSync(outputDir, { recursive: true });
  }

  const record =
    outcome.status === 'failed'
      ? { question: outcome.query.question, status: outcome.status, error: outcome.reason }
      : {
          question: outcome.query.question,
          status: outcome.status,
          answer: outcome.answer.text,
          sources: outcome.answer.citations.map(formatCitation),
          citations: outcome.answer.citations,
          weather: outcome.weather,
          weatherNotice: outcome.status === 'degraded' ? outcome.reason : null,
          location: outcome.query.weatherEnabled ? outcome.query.location ?? null : null
        };

  fs.writeFileSync(outputPath, JSON.stringify(record, null, 2), 'utf-8');
  logger.success(`Answer saved to: ${outputPath}`);
}
