import type { HistoryService } from "../history/history.service";
import type { HistoryRecord } from "../history/history.types";
import type { ReviewPriority } from "../pipeline/routing";

export type ReviewQueueQuery = {
  priority?: ReviewPriority;
  limit: number;
  offset: number;
};

export type ReviewQueuePage = {
  documents: HistoryRecord[];
  total: number;
  limit: number;
  offset: number;
};

/** Documents routed to manual review, highest priority first, then oldest first. */
export class ReviewQueueService {
  constructor(private readonly history: Pick<HistoryService, "query">) {}

  async list(query: ReviewQueueQuery): Promise<ReviewQueuePage> {
    const page = await this.history.query({
      status: "requires_review",
      priority: query.priority,
      limit: query.limit,
      offset: query.offset,
      order: "review_priority",
    });
    return {
      documents: page.records,
      total: page.total,
      limit: query.limit,
      offset: query.offset,
    };
  }
}
