import { PRIORITY_ORDER, type TaskPriority } from "../contracts.js";
import { ResourceExhaustedError } from "../errors.js";

type LaneEntry = { taskId: string; seq: number };
type Membership = { priority: TaskPriority; seq: number };

const emptyCounts = (): Record<TaskPriority, number> => ({ urgent: 0, high: 0, medium: 0, low: 0 });

/**
 * Four FIFO lanes of task ids. An id lives in at most one lane at a time.
 * Removal is lazy: a removed entry stays in its array until it reaches the
 * head. Entries carry the sequence number of their insertion, so a task that
 * is removed and pushed again goes to the tail rather than reviving its old
 * slot.
 */
export class PriorityLanes {
  private readonly lanes: Record<TaskPriority, LaneEntry[]> = { urgent: [], high: [], medium: [], low: [] };
  private readonly heads = emptyCounts();
  private readonly depths = emptyCounts();
  private readonly members = new Map<string, Membership>();
  private seq = 0;

  constructor(private readonly depthLimit = Number.POSITIVE_INFINITY) {}

  /** Tail insert. With enforceLimit, a full lane throws ResourceExhaustedError. */
  push(taskId: string, priority: TaskPriority, options: { enforceLimit?: boolean } = {}): void {
    if (this.members.has(taskId)) return;
    if (options.enforceLimit && this.isFull(priority)) {
      throw new ResourceExhaustedError(priority, this.depthLimit);
    }
    const seq = ++this.seq;
    this.lanes[priority].push({ taskId, seq });
    this.members.set(taskId, { priority, seq });
    this.depths[priority] += 1;
  }

  private isFull(priority: TaskPriority): boolean {
    return this.depths[priority] >= this.depthLimit;
  }

  /** Removes and returns the head of the first non-empty lane, urgent first. */
  shift(): { taskId: string; priority: TaskPriority } | null {
    for (const priority of PRIORITY_ORDER) {
      const lane = this.lanes[priority];
      while (this.heads[priority] < lane.length) {
        const entry = lane[this.heads[priority]];
        this.heads[priority] += 1;
        if (this.isLive(entry, priority)) {
          this.members.delete(entry.taskId);
          this.depths[priority] -= 1;
          this.compact(priority);
          return { taskId: entry.taskId, priority };
        }
      }
      this.compact(priority);
    }
    return null;
  }

  remove(taskId: string): boolean {
    const membership = this.members.get(taskId);
    if (!membership) return false;
    this.members.delete(taskId);
    this.depths[membership.priority] -= 1;
    return true;
  }

  depthsByPriority(): Record<TaskPriority, number> {
    return { ...this.depths };
  }

  private isLive(entry: LaneEntry, priority: TaskPriority): boolean {
    const membership = this.members.get(entry.taskId);
    return membership !== undefined && membership.priority === priority && membership.seq === entry.seq;
  }

  private compact(priority: TaskPriority): void {
    const head = this.heads[priority];
    if (head > 64 && head * 2 > this.lanes[priority].length) {
      this.lanes[priority] = this.lanes[priority].slice(head);
      this.heads[priority] = 0;
    }
  }
}
