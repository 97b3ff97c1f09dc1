import type { FeedSession } from '../session/FeedSession';
import type { DiscoveryStrategy } from '../strategies/types';

export interface DrainedTarget {
  order: number;
  url?: string;
}

/** Run a strategy to the end, loading each target like the runner would */
export async function drain(
  strategy: DiscoveryStrategy,
  session: FeedSession,
  { load = true }: { load?: boolean } = {}
): Promise<DrainedTarget[]> {
  const targets: DrainedTarget[] = [];
  for await (const target of strategy.items(session)) {
    if (load) {
      await target.load();
    }
    targets.push({ order: target.order, url: target.url });
  }
  return targets;
}
