/**
 * Evaluation datasets: `datasets/<name>/documents.json` and `queries.json`.
 */

import fs from 'node:fs/promises';
import path from 'node:path';
import {z} from 'zod';
import {getDatasetsDir} from '../lib/constants.js';
import {ValidationError, errorMessage} from '../lib/errors.js';
import {formatIssues} from '../indexing/schema.js';

const datasetDocumentSchema = z.object({
	id: z.string().min(1),
	title: z.string().default(''),
	content: z.string().default(''),
	languageCode: z.string().optional(),
	tags: z.array(z.string()).optional(),
	path: z.string().optional(),
});

const datasetQuerySchema = z.object({
	q: z.string().min(1),
	/** Ids of the documents a good ranking returns */
	expected: z.array(z.string()),
});

export type DatasetDocument = z.infer<typeof datasetDocumentSchema>;
export type DatasetQuery = z.infer<typeof datasetQuerySchema>;

export interface EvaluationDataset {
	name: string;
	documents: DatasetDocument[];
	queries: DatasetQuery[];
}

const DATASET_NAME = /^[a-z0-9][a-z0-9_-]*$/i;

/**
 * Validate a dataset; every expected id must name one of its documents.
 */
export function parseDataset(
	name: string,
	documents: unknown,
	queries: unknown,
): EvaluationDataset {
	const parsedDocuments = z.array(datasetDocumentSchema).safeParse(documents);
	const parsedQueries = z.array(datasetQuerySchema).safeParse(queries);

	const issues = [
		...(parsedDocuments.success
			? []
			: formatIssues(parsedDocuments.error, 'documents.')),
		...(parsedQueries.success
			? []
			: formatIssues(parsedQueries.error, 'queries.')),
	];

	if (parsedDocuments.success && parsedQueries.success) {
		const ids = new Set(parsedDocuments.data.map(d => d.id));
		parsedQueries.data.forEach((query, i) => {
			for (const id of query.expected) {
				if (!ids.has(id)) {
					issues.push(`queries.${i}.expected: unknown document "${id}"`);
				}
			}
		});
	}

	if (!parsedDocuments.success || !parsedQueries.success || issues.length) {
		throw new ValidationError(issues, `Invalid dataset "${name}"`);
	}

	return {name, documents: parsedDocuments.data, queries: parsedQueries.data};
}

/**
 * Load a dataset by directory name.
 */
export async function loadDataset(
	name: string,
	datasetsDir: string = getDatasetsDir(),
): Promise<EvaluationDataset> {
	if (!DATASET_NAME.test(name)) {
		throw new ValidationError([`dataset: invalid name "${name}"`]);
	}
	const dir = path.join(datasetsDir, name);

	const [documents, queries] = await Promise.all([
		readJson(path.join(dir, 'documents.json')),
		readJson(path.join(dir, 'queries.json')),
	]);
	return parseDataset(name, documents, queries);
}

async function readJson(file: string): Promise<unknown> {
	let raw: string;
	try {
		raw = await fs.readFile(file, 'utf8');
	} catch (error) {
		throw new ValidationError(
			[`${path.basename(file)}: ${errorMessage(error)}`],
			`Cannot read dataset file ${file}`,
		);
	}
	try {
		const parsed: unknown = JSON.parse(raw);
		return parsed;
	} catch (error) {
		throw new ValidationError(
			[`${path.basename(file)}: ${errorMessage(error)}`],
			`Invalid JSON in ${file}`,
		);
	}
}
