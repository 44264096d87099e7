// Per-conversation execution plans, evicted least-recently-used first.

export interface PlanStep {
  title: string;
  status: 'pending' | 'in_progress' | 'done';
}

export interface ConversationPlan {
  summary: string;
  steps: PlanStep[];
  updatedAt: string;
}

export const DEFAULT_PLAN_CAPACITY = 50;

export class PlanStore {
  private readonly plans = new Map<string, ConversationPlan>();

  constructor(private readonly capacity: number = DEFAULT_PLAN_CAPACITY) {}

  get(conversationId: string): ConversationPlan | undefined {
    const plan = this.plans.get(conversationId);
    if (plan) {
      // Re-insert to mark as most recently used
      this.plans.delete(conversationId);
      this.plans.set(conversationId, plan);
    }
    return plan;
  }

  set(conversationId: string, plan: ConversationPlan): void {
    this.plans.delete(conversationId);
    this.plans.set(conversationId, plan);

    while (this.plans.size > this.capacity) {
      const oldest = this.plans.keys().next();
      if (oldest.done) break;
      this.plans.delete(oldest.value);
    }
  }

  delete(conversationId: string): void {
    this.plans.delete(conversationId);
  }

  get size(): number {
    return this.plans.size;
  }
}
