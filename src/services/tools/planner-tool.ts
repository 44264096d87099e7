import type { ToolDefinition } from './types.js';
import type { JsonValue } from '../../utils/json-value.js';
import { isJsonObject, stringArg } from '../../utils/json-value.js';
import type { ConversationPlan, PlanStep, PlanStore } from './plan-store.js';

const STEP_STATUSES: readonly PlanStep['status'][] = ['pending', 'in_progress', 'done'];

function toStep(value: JsonValue): PlanStep | null {
  if (typeof value === 'string') {
    return value.trim() ? { title: value.trim(), status: 'pending' } : null;
  }
  if (!isJsonObject(value)) return null;

  const title = stringArg(value, 'title', 'step', 'description');
  if (!title) return null;
  const status = STEP_STATUSES.find(s => s === value.status) ?? 'pending';
  return { title: title.trim(), status };
}

export function formatPlan(plan: ConversationPlan): string {
  const marks: Record<PlanStep['status'], string> = { pending: '[ ]', in_progress: '[~]', done: '[x]' };
  const lines = plan.steps.map((step, index) => `${index + 1}. ${marks[step.status]} ${step.title}`);
  return [plan.summary, ...lines].filter(Boolean).join('\n');
}

export function createPlannerTool(store: PlanStore): ToolDefinition {
  return {
    name: 'planner',
    kind: 'read',
    description: 'Create, update or read the execution plan for this conversation. Call with "steps" to replace the plan, or with action "get" to read it.',
    parameters: [
      {
        name: 'action',
        type: 'string',
        description: 'Either "set" (default) or "get"',
        required: false,
        enum: ['set', 'get'],
      },
      {
        name: 'summary',
        type: 'string',
        description: 'One-line goal of the plan',
        required: false,
      },
      {
        name: 'steps',
        type: 'array',
        description: 'Ordered plan steps; strings or {title, status} objects',
        required: false,
        items: { type: 'object' },
      },
    ],

    async execute(args) {
      const conversationId = stringArg(args, '_conversation_id') ?? 'default';
      const action = stringArg(args, 'action') ?? 'set';

      if (action === 'get') {
        const plan = store.get(conversationId);
        return plan ? formatPlan(plan) : 'No plan recorded for this conversation yet.';
      }

      const rawSteps = args.steps;
      const steps = Array.isArray(rawSteps)
        ? rawSteps.map(toStep).filter((step): step is PlanStep => step !== null)
        : [];
      if (steps.length === 0) {
        throw new Error('A plan needs at least one step in "steps"');
      }

      const plan: ConversationPlan = {
        summary: stringArg(args, 'summary')?.trim() ?? '',
        steps,
        updatedAt: new Date().toISOString(),
      };
      store.set(conversationId, plan);
      return `Plan saved (${steps.length} step(s))\n${formatPlan(plan)}`;
    },
  };
}
