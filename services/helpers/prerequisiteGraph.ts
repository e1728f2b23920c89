import { ValidationError } from '../base/ServiceError';

export interface PrerequisiteNode {
  topicId: string;
  prerequisites: readonly string[];
}

/**
 * Topic id -> prerequisite ids for one learning plan. Construction rejects
 * duplicate topics, references to topics outside the plan, and cycles.
 */
export class PrerequisiteGraph {
  private readonly edges = new Map<string, readonly string[]>();

  constructor(nodes: readonly PrerequisiteNode[]) {
    for (const node of nodes) {
      if (this.edges.has(node.topicId)) {
        throw new ValidationError(`Duplicate topic '${node.topicId}' in learning plan`);
      }
      this.edges.set(node.topicId, [...new Set(node.prerequisites)]);
    }

    for (const [topicId, prerequisites] of this.edges) {
      const unknown = prerequisites.filter(id => !this.edges.has(id));
      if (unknown.length > 0) {
        throw new ValidationError(`Topic '${topicId}' has prerequisites outside the plan`, { topicId, unknown });
      }
    }

    const cycle = this.findCycle();
    if (cycle) {
      throw new ValidationError(`Prerequisite cycle: ${cycle.join(' -> ')}`, { cycle });
    }
  }

  has(topicId: string): boolean {
    return this.edges.has(topicId);
  }

  prerequisitesOf(topicId: string): readonly string[] {
    return this.edges.get(topicId) ?? [];
  }

  unmetPrerequisites(topicId: string, isCompleted: (topicId: string) => boolean): string[] {
    return this.prerequisitesOf(topicId).filter(id => !isCompleted(id));
  }

  isEligible(topicId: string, isCompleted: (topicId: string) => boolean): boolean {
    return this.unmetPrerequisites(topicId, isCompleted).length === 0;
  }

  // Depth-first search with an explicit path; returns the first cycle found.
  private findCycle(): string[] | null {
    const done = new Set<string>();
    const onPath: string[] = [];

    const visit = (topicId: string): string[] | null => {
      const index = onPath.indexOf(topicId);
      if (index >= 0) return [...onPath.slice(index), topicId];
      if (done.has(topicId)) return null;

      onPath.push(topicId);
      for (const prerequisite of this.prerequisitesOf(topicId)) {
        const cycle = visit(prerequisite);
        if (cycle) return cycle;
      }
      onPath.pop();
      done.add(topicId);
      return null;
    };

    for (const topicId of this.edges.keys()) {
      const cycle = visit(topicId);
      if (cycle) return cycle;
    }
    return null;
  }
}
