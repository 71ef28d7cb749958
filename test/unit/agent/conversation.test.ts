import { describe, it, expect, beforeEach } from 'vitest';
import { Conversation, deepFreeze, type ToolResult } from '../../../src/agent/conversation.js';
import { ConversationOrderError } from '../../../src/errors.js';

function successResult(callId: string, payload = 'ok'): ToolResult {
  return {
    callId,
    toolName: 'retrieve_related_papers',
    arguments: { query: 'graph neural networks' },
    outcome: { status: 'success', payload },
  };
}

describe('Conversation', () => {
  let conversation: Conversation;

  beforeEach(() => {
    conversation = new Conversation();
  });

  describe('ordering', () => {
    it('should accept user → model → tools → model', () => {
      conversation.addUser('Find papers on GNNs');
      conversation.addModel('', [
        { id: 'a', name: 'retrieve_related_papers', arguments: { query: 'gnn' } },
        { id: 'b', name: 'explain_research_paper', arguments: { paper_info: 'x' } },
      ]);
      expect(conversation.pendingCallIds()).toEqual(['a', 'b']);

      conversation.addToolResult(successResult('b'));
      conversation.addToolResult(successResult('a'));
      conversation.addModel('Here are the papers');

      expect(conversation.turns.map((t) => t.role)).toEqual(['user', 'model', 'tool', 'tool', 'model']);
      expect(conversation.awaitingUser).toBe(true);
    });

    it('should reject a model turn before any user turn', () => {
      expect(() => conversation.addModel('hi')).toThrow(ConversationOrderError);
    });

    it('should reject a user turn while tool results are pending', () => {
      conversation.addUser('q');
      conversation.addModel('', [{ id: 'a', name: 't', arguments: {} }]);
      expect(() => conversation.addUser('again')).toThrow(ConversationOrderError);
    });

    it('should reject a model turn until every call has a result', () => {
      conversation.addUser('q');
      conversation.addModel('', [
        { id: 'a', name: 't', arguments: {} },
        { id: 'b', name: 't', arguments: {} },
      ]);
      conversation.addToolResult(successResult('a'));

      expect(() => conversation.addModel('done')).toThrow('Tool results still pending for: b');
    });

    it('should reject results for unknown or already answered calls', () => {
      conversation.addUser('q');
      conversation.addModel('', [{ id: 'a', name: 't', arguments: {} }]);
      conversation.addToolResult(successResult('a'));

      expect(() => conversation.addToolResult(successResult('a'))).toThrow(
        'No pending tool call with id a'
      );
    });

    it('should reject duplicate call ids in one model turn', () => {
      conversation.addUser('q');
      expect(() =>
        conversation.addModel('', [
          { id: 'a', name: 't', arguments: {} },
          { id: 'a', name: 't', arguments: {} },
        ])
      ).toThrow('unique');
    });

    it('should allow a second exchange after a final answer', () => {
      conversation.addUser('one');
      conversation.addModel('first answer');
      conversation.addUser('two');
      expect(conversation.length).toBe(3);
    });
  });

  describe('immutability', () => {
    it('should freeze appended turns including nested arguments', () => {
      const args = { query: 'q', options: { limit: 3 } };
      conversation.addUser('q');
      const turn = conversation.addModel('', [{ id: 'a', name: 't', arguments: args }]);

      expect(Object.isFrozen(turn)).toBe(true);
      expect(Object.isFrozen(turn.toolCalls[0]?.arguments)).toBe(true);
      expect(Object.isFrozen(args.options)).toBe(true);
    });

    it('should leave binary attachment data writable', () => {
      const data = new Uint8Array([1, 2, 3]);
      const turn = conversation.addUser('see file', [
        { name: 'paper.pdf', mediaType: 'application/pdf', data },
      ]);

      expect(Object.isFrozen(turn.attachments[0])).toBe(true);
      expect(turn.attachments[0]?.data).toBe(data);
    });

    it('deepFreeze should pass primitives through', () => {
      expect(deepFreeze(5)).toBe(5);
      expect(deepFreeze(null)).toBeNull();
    });
  });

  describe('rollback', () => {
    it('should return to the end of the previous exchange', () => {
      conversation.addUser('one');
      conversation.addModel('answer');
      conversation.addUser('two');
      conversation.addModel('', [{ id: 'a', name: 't', arguments: {} }]);

      conversation.rollback(2);

      expect(conversation.length).toBe(2);
      expect(conversation.awaitingUser).toBe(true);
      expect(conversation.pendingCallIds()).toEqual([]);
    });

    it('should refuse to stop mid-exchange', () => {
      conversation.addUser('one');
      conversation.addModel('answer');
      expect(() => conversation.rollback(1)).toThrow(ConversationOrderError);
      expect(() => conversation.rollback(5)).toThrow(ConversationOrderError);
    });
  });

  it('clear should empty the history', () => {
    conversation.addUser('one');
    conversation.clear();
    expect(conversation.length).toBe(0);
    expect(conversation.lastTurn).toBeUndefined();
  });
});
