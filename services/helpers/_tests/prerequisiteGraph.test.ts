import { describe, it, expect } from 'vitest';
import { PrerequisiteGraph } from '../prerequisiteGraph';
import { ValidationError } from '../../base/ServiceError';

describe('PrerequisiteGraph', () => {
  const chain = [
    { topicId: 'intro', prerequisites: [] },
    { topicId: 'adm', prerequisites: ['intro'] },
    { topicId: 'governance', prerequisites: ['intro', 'adm'] },
  ];

  it('reports unmet prerequisites in declaration order', () => {
    const graph = new PrerequisiteGraph(chain);
    const completed = new Set(['intro']);

    expect(graph.unmetPrerequisites('governance', id => completed.has(id))).toEqual(['adm']);
    expect(graph.isEligible('adm', id => completed.has(id))).toBe(true);
    expect(graph.isEligible('governance', id => completed.has(id))).toBe(false);
  });

  it('treats unknown topics as having no prerequisites', () => {
    const graph = new PrerequisiteGraph(chain);

    expect(graph.has('missing')).toBe(false);
    expect(graph.prerequisitesOf('missing')).toEqual([]);
  });

  it('collapses repeated prerequisites', () => {
    const graph = new PrerequisiteGraph([
      { topicId: 'a', prerequisites: [] },
      { topicId: 'b', prerequisites: ['a', 'a'] },
    ]);

    expect(graph.prerequisitesOf('b')).toEqual(['a']);
  });

  it('rejects duplicate topics', () => {
    expect(() => new PrerequisiteGraph([
      { topicId: 'a', prerequisites: [] },
      { topicId: 'a', prerequisites: [] },
    ])).toThrow("Duplicate topic 'a' in learning plan");
  });

  it('rejects prerequisites outside the plan', () => {
    let caught: unknown;
    try {
      new PrerequisiteGraph([{ topicId: 'a', prerequisites: ['ghost'] }]);
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ValidationError);
    expect(caught).toMatchObject({ details: { topicId: 'a', unknown: ['ghost'] } });
  });

  it('rejects cycles and names the path', () => {
    expect(() => new PrerequisiteGraph([
      { topicId: 'a', prerequisites: ['b'] },
      { topicId: 'b', prerequisites: ['a'] },
    ])).toThrow('Prerequisite cycle: a -> b -> a');
  });

  it('rejects a topic that requires itself', () => {
    expect(() => new PrerequisiteGraph([{ topicId: 'a', prerequisites: ['a'] }]))
      .toThrow('Prerequisite cycle: a -> a');
  });
});
