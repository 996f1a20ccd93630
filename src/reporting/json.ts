import { blockBurnRate } from '../blocks.js';
import type { QuotaSnapshot } from '../engine.js';

/** Plain-JSON view of a snapshot for `--json`; dates serialize as ISO strings. */
export function snapshotToJson(snapshot: QuotaSnapshot): unknown {
	const { activeBlock } = snapshot;
	return {
		now: snapshot.now.toISOString(),
		quotas: [snapshot.session, snapshot.weeklyAll, snapshot.weeklyFiltered, snapshot.cost],
		sessionLimit: snapshot.sessionLimit,
		activeBlock:
			activeBlock == null
				? null
				: {
						id: activeBlock.id,
						start: activeBlock.start,
						end: activeBlock.end,
						tokens: activeBlock.tokens,
						costUSD: activeBlock.costUSD,
						burnRate: blockBurnRate(activeBlock, snapshot.now),
					},
		blocks: snapshot.blocks.map((block) => ({
			id: block.id,
			start: block.start,
			end: block.end,
			isActive: block.isActive,
			isGap: block.isGap,
			records: block.records.length,
			tokens: block.tokens,
		})),
		boundaries: snapshot.boundaries,
		scan: snapshot.scan,
	};
}
