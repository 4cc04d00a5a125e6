/**
 * Tests for chat message classification
 */

import {
  classifyIntent,
  classifyIssueType,
  isAddressedToBot,
} from '../../../src/chat/intent-classifier';

describe('classifyIntent', () => {
  it.each([
    ['I cannot login to the console', 'technical_issue'],
    ['Access denied on my bucket', 'technical_issue'],
    ['The stack is stuck', 'technical_issue'],
    ['My DEPLOY failed', 'technical_issue'],
    ['What does Block Public Access do?', 'technical_issue'],
    ['What is SSE-KMS?', 'general_question'],
    ['', 'general_question'],
  ])('should classify "%s" as %s', (message, intent) => {
    expect(classifyIntent(message)).toBe(intent);
  });
});

describe('classifyIssueType', () => {
  it.each([
    ['login fails with access denied', 'login'],
    ['permission denied', 'permission'],
    ['which IAM role do I need', 'permission'],
    ['https requests rejected', 'security'],
    ['encryption setting is wrong', 'security'],
    ['lab setup is broken', 'setup'],
    ['deploy error', 'deployment'],
    ['it just does not work', 'general'],
  ])('should classify "%s" as %s', (message, issueType) => {
    expect(classifyIssueType(message)).toBe(issueType);
  });

  it('should apply rules in order when several keywords match', () => {
    expect(classifyIssueType('access to the lab')).toBe('permission');
    expect(classifyIssueType('setup error')).toBe('setup');
  });
});

describe('isAddressedToBot', () => {
  it('should detect trigger phrases in any case', () => {
    expect(isAddressedToBot('@Bot what is lab 3 about?')).toBe(true);
    expect(isAddressedToBot('Question: where is the console?')).toBe(true);
    expect(isAddressedToBot('I need HELP')).toBe(true);
  });

  it('should ignore ordinary chat', () => {
    expect(isAddressedToBot('good morning everyone')).toBe(false);
  });
});
