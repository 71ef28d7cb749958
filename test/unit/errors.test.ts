import { describe, it, expect } from 'vitest';
import {
  AssistantError,
  ErrorCode,
  UnknownToolError,
  SchemaValidationError,
  ToolExecutionError,
  IterationLimitExceededError,
  ProviderError,
  toToolFailure,
  errorMessage,
  isAssistantError,
} from '../../src/errors.js';

describe('errors', () => {
  describe('AssistantError', () => {
    it('should serialize code, message and details without the stack', () => {
      const error = new AssistantError(ErrorCode.PROVIDER, 'down', { status: 503 });
      const json = error.toJSON();

      expect(json).toEqual({ code: 'ProviderError', message: 'down', details: { status: 503 } });
      expect(JSON.stringify(error)).not.toContain('stack');
    });

    it('should omit details when absent', () => {
      expect(new AssistantError(ErrorCode.PROVIDER, 'down').toJSON()).toEqual({
        code: 'ProviderError',
        message: 'down',
      });
    });
  });

  describe('specific errors', () => {
    it('should name the unknown tool and list alternatives', () => {
      const error = new UnknownToolError('delete_database', ['retrieve_related_papers']);

      expect(error.message).toBe('Unknown tool: delete_database');
      expect(error.code).toBe('UnknownTool');
      expect(error.details).toEqual({ availableTools: ['retrieve_related_papers'] });
      expect(error).toBeInstanceOf(UnknownToolError);
    });

    it('should join validation issues into the message', () => {
      const error = new SchemaValidationError('explain_research_paper', [
        'paper_info: Required',
      ]);

      expect(error.message).toBe('Invalid arguments for explain_research_paper: paper_info: Required');
      expect(error).toBeInstanceOf(SchemaValidationError);
    });

    it('should keep the original error as cause', () => {
      const cause = new Error('socket hang up');
      const wrapped = new ToolExecutionError('recommend_similar_papers', 'socket hang up', cause);
      expect(wrapped.cause).toBe(cause);

      const provider = new ProviderError('unreachable', cause);
      expect(provider.cause).toBe(cause);
      expect(provider.name).toBe('ProviderError');
    });

    it('should report the iteration limit', () => {
      const error = new IterationLimitExceededError(10);
      expect(error.message).toBe('Tool-calling iteration limit of 10 reached');
      expect(error.limit).toBe(10);
    });
  });

  describe('toToolFailure', () => {
    it('should carry code and details of assistant errors', () => {
      const failure = toToolFailure(new UnknownToolError('delete_database', ['a_tool']), 'delete_database');

      expect(failure).toEqual({
        tool: 'delete_database',
        error_type: 'UnknownTool',
        error_message: 'Unknown tool: delete_database',
        details: { availableTools: ['a_tool'] },
      });
    });

    it('should classify plain errors as tool execution failures', () => {
      expect(toToolFailure(new TypeError('bad'), 'x')).toEqual({
        tool: 'x',
        error_type: 'ToolExecution',
        error_message: 'bad',
      });
    });

    it('should stringify non-error throws', () => {
      expect(toToolFailure('plain string', 'x').error_message).toBe('plain string');
      expect(errorMessage(42)).toBe('42');
    });
  });

  it('isAssistantError should reject plain errors', () => {
    expect(isAssistantError(new Error('x'))).toBe(false);
    expect(isAssistantError(new ProviderError('x'))).toBe(true);
  });
});
