import { describe, it, expect } from 'vitest';
import {
  AgentError,
  ConfigurationError,
  IterationLimitError,
  PlannerError,
  QueryTimeoutError,
  TransportError,
  ValidationError,
  isPlannerError,
  toPublicMessage,
  wrapError,
} from './errors.js';

describe('toPublicMessage', () => {
  it('maps each error class to its public message', () => {
    expect(toPublicMessage(new ConfigurationError('GROQ_API_KEY is not set'))).toBe(
      'The travel planner is not configured correctly.'
    );
    expect(toPublicMessage(new AgentError('empty answer'))).toBe('The travel agent could not complete this request.');
    expect(toPublicMessage(new IterationLimitError(10))).toBe(
      'The travel agent was unable to complete this request within the allowed number of steps.'
    );
    expect(toPublicMessage(new TransportError('groq request failed: 429', 'groq', 429))).toBe(
      'The language model service is unavailable. Please try again later.'
    );
    expect(toPublicMessage(new QueryTimeoutError(1000))).toBe('The request timed out before a plan could be generated.');
  });

  it('passes validation messages through', () => {
    expect(toPublicMessage(new ValidationError('question must not be empty'))).toBe('question must not be empty');
  });

  it('hides anything else', () => {
    expect(toPublicMessage(new Error('ECONNRESET at 10.0.0.1'))).toBe(
      'An unexpected error occurred while planning your trip.'
    );
    expect(toPublicMessage(new PlannerError('odd'))).toBe('An unexpected error occurred while planning your trip.');
    expect(toPublicMessage('string thrown')).toBe('An unexpected error occurred while planning your trip.');
  });
});

describe('PlannerError', () => {
  it('keeps the code hierarchy', () => {
    const error = new IterationLimitError(3);

    expect(error).toBeInstanceOf(AgentError);
    expect(error.code).toBe('AGENT_ITERATION_LIMIT');
    expect(error.message).toBe('Agent stopped after 3 model calls without a final answer');
    expect(isPlannerError(error)).toBe(true);
    expect(isPlannerError(new Error('plain'))).toBe(false);
  });

  it('includes the cause in the full message', () => {
    const error = new TransportError('claude request failed', 'claude', 500, new Error('socket hang up'));

    expect(error.getFullMessage()).toBe('[TRANSPORT_ERROR] claude request failed\n  Caused by: socket hang up');
  });
});

describe('wrapError', () => {
  it('leaves planner errors alone and wraps the rest', () => {
    const planner = new AgentError('x');
    expect(wrapError(planner, 'ignored')).toBe(planner);

    const wrapped = wrapError(new Error('boom'), 'Tool setup failed', 'CONFIGURATION_ERROR');
    expect(wrapped.message).toBe('Tool setup failed: boom');
    expect(wrapped.code).toBe('CONFIGURATION_ERROR');
  });
});
