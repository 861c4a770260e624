import fs from 'fs/promises';
import {z} from 'zod';
import {logger} from '../config/logger.js';
import {DataParseError} from '../types/errors.js';
import {CandidateDistance, CandidateOutcome, CentroidOutcomes} from '../types/domain.js';
import {minimumTravelTime} from '../accessibility/travelTimeResolver.js';
import {formatLatLng} from '../loaders/coordinates.js';

export const CHECKPOINT_VERSION = 2;

const entrySchema = z
	.object({
		geoid: z.string().min(1),
		/** "lat,lon" of each candidate clinic, in query order */
		candidates: z.array(z.string()),
		minutes: z.array(z.number().nullable()),
	})
	.refine((entry) => entry.candidates.length === entry.minutes.length, {message: 'candidates and minutes differ in length'});

const checkpointSchema = z.object({
	version: z.literal(CHECKPOINT_VERSION),
	departure: z.string(),
	entries: z.array(entrySchema),
});

export type Checkpoint = z.infer<typeof checkpointSchema>;
export type CheckpointEntry = Checkpoint['entries'][number];

export function candidateKeys(candidates: CandidateDistance[]): string[] {
	return candidates.map((candidate) => formatLatLng(candidate.clinic));
}

/**
 * True when the entry was computed against exactly these candidate clinics, in this order.
 */
export function matchesCandidates(entry: CheckpointEntry, candidates: CandidateDistance[]): boolean {
	const keys = candidateKeys(candidates);
	return keys.length === entry.candidates.length && keys.every((key, index) => key === entry.candidates[index]);
}

/**
 * Only answers that would come back the same on a retry are worth storing: a route or a
 * definite "no route". Rejected, throttled and network failures are queried again next run.
 */
export function isSettled(result: CentroidOutcomes): boolean {
	return result.outcomes.every((outcome) => outcome.status === 'ok' || !outcome.retryable);
}

export function toCheckpointEntry(result: CentroidOutcomes, candidates: CandidateDistance[]): CheckpointEntry {
	return {
		geoid: result.geoid,
		candidates: candidateKeys(candidates),
		minutes: result.outcomes.map((outcome) => (outcome.status === 'ok' ? outcome.minutes : null)),
	};
}

export function outcomesFromEntry(entry: CheckpointEntry): CandidateOutcome[] {
	return entry.minutes.map((minutes): CandidateOutcome => (minutes === null ? {status: 'failed', reason: 'no transit route in an earlier run', retryable: false} : {status: 'ok', minutes}));
}

export function entryMinimum(entry: CheckpointEntry): number | null {
	return minimumTravelTime(outcomesFromEntry(entry));
}

/**
 * Write the checkpoint through a temporary file so a crash never leaves half a file.
 */
export async function writeCheckpoint(filePath: string, checkpoint: Checkpoint): Promise<void> {
	const tempPath = `${filePath}.tmp`;
	await fs.writeFile(tempPath, JSON.stringify(checkpoint), 'utf8');
	await fs.rename(tempPath, filePath);
	logger.info({filePath, entryCount: checkpoint.entries.length}, 'Checkpoint written');
}

function isMissingFile(error: unknown): boolean {
	return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}

const versionSchema = z.object({version: z.number()});

/**
 * Null when no checkpoint exists yet, or when it was written in an older format.
 */
export async function readCheckpoint(filePath: string): Promise<Checkpoint | null> {
	let text: string;
	try {
		text = await fs.readFile(filePath, 'utf8');
	} catch (error) {
		if (isMissingFile(error)) return null;
		throw error;
	}

	let json: unknown;
	try {
		json = JSON.parse(text);
	} catch {
		throw new DataParseError('checkpoint is not valid JSON', filePath);
	}

	const version = versionSchema.safeParse(json);
	if (version.success && version.data.version !== CHECKPOINT_VERSION) {
		logger.warn({filePath, version: version.data.version, expected: CHECKPOINT_VERSION}, 'Checkpoint has an older format; ignoring it');
		return null;
	}

	const parsed = checkpointSchema.safeParse(json);
	if (!parsed.success) {
		throw new DataParseError('checkpoint has an unexpected shape', filePath);
	}
	return parsed.data;
}
