import type { ActivityRecord, Cell, TimelineRecord, VisitRecord } from "@timeline-csv/schema";

export type TimelineTables = {
	activities: ActivityRecord[];
	visits: VisitRecord[];
};

export type TimelineAccumulator = {
	add: (record: TimelineRecord) => void;
	counts: () => { activities: number; visits: number };
	/** Both tables, each stably sorted by start time. */
	tables: () => TimelineTables;
};

// Missing start times go last, like a pandas sort with na_position="last".
// Timestamps are ISO strings; other scalars compare numerically when both are numbers, else by their text.
const compareStartTime = (a: { start_time: Cell }, b: { start_time: Cell }): number => {
	if (a.start_time === b.start_time) return 0;
	if (a.start_time === null) return 1;
	if (b.start_time === null) return -1;
	if (typeof a.start_time === "number" && typeof b.start_time === "number") return a.start_time - b.start_time;
	const left = String(a.start_time);
	const right = String(b.start_time);
	return left === right ? 0 : left < right ? -1 : 1;
};

/** Array.prototype.sort is stable, so records sharing a start time keep their encounter order. */
export const sortByStartTime = <T extends { start_time: Cell }>(records: readonly T[]): T[] => [...records].sort(compareStartTime);

export const createTimelineAccumulator = (): TimelineAccumulator => {
	const activities: ActivityRecord[] = [];
	const visits: VisitRecord[] = [];

	return {
		add: record => {
			switch (record.timeline_type) {
				case "activity":
					activities.push(record);
					break;
				case "visit":
					visits.push(record);
					break;
			}
		},
		counts: () => ({ activities: activities.length, visits: visits.length }),
		tables: () => ({
			activities: sortByStartTime(activities),
			visits: sortByStartTime(visits),
		}),
	};
};
