/**
 * Zod schema for document submissions.
 */

import {z} from 'zod';
import {ValidationError} from '../lib/errors.js';
import {REACH_VALUES, type DocumentSubmission} from './types.js';

/** Group slugs: lowercase words joined by single hyphens */
const GROUP_PATTERN = /^[a-z0-9]+(?:-[a-z0-9]+)*$/;

/** Largest declared document size (100 GiB) */
export const MAX_DOCUMENT_SIZE = 100 * 1024 ** 3;

/** Timestamps must carry a UTC offset; stored as UTC ISO strings */
const timestampSchema = z
	.string()
	.datetime({offset: true, message: 'must be a datetime with a timezone'})
	.transform(value => new Date(value).toISOString());

const submissionShape = z.object({
	id: z.string().trim().min(1).max(300),
	title: z.string().trim().max(300).default(''),
	content: z.string().default(''),
	reach: z.enum(REACH_VALUES).default('restricted'),
	owner: z.string().trim().min(1).max(50),
	users: z.array(z.string().trim().min(1).max(50)).default([]),
	groups: z
		.array(z.string().regex(GROUP_PATTERN, 'must be a lowercase slug'))
		.default([]),
	isActive: z.boolean().default(true),
	languageCode: z.string().trim().min(1).optional(),
	tags: z.array(z.string().trim().min(1).max(100)).default([]),
	path: z.string().trim().min(1).max(300).optional(),
	createdAt: timestampSchema.optional(),
	updatedAt: timestampSchema.optional(),
	size: z.number().int().min(0).max(MAX_DOCUMENT_SIZE).optional(),
});

/**
 * Submission schema checked against the given clock: timestamps may not lie
 * in the future and a document cannot be updated before it was created.
 */
export function createSubmissionSchema(now: Date) {
	return submissionShape.superRefine((doc, ctx) => {
		if (doc.title.length === 0 && doc.content.trim().length === 0) {
			ctx.addIssue({
				code: z.ZodIssueCode.custom,
				message: 'Either title or content should have at least 1 character',
				path: ['content'],
			});
		}
		for (const field of ['createdAt', 'updatedAt'] as const) {
			const value = doc[field];
			if (value !== undefined && Date.parse(value) > now.getTime()) {
				ctx.addIssue({
					code: z.ZodIssueCode.custom,
					message: 'must be earlier than now',
					path: [field],
				});
			}
		}
		if (
			doc.createdAt !== undefined &&
			doc.updatedAt !== undefined &&
			Date.parse(doc.updatedAt) < Date.parse(doc.createdAt)
		) {
			ctx.addIssue({
				code: z.ZodIssueCode.custom,
				message: 'must not be earlier than createdAt',
				path: ['updatedAt'],
			});
		}
	});
}

export type DocumentSubmissionInput = z.input<typeof submissionShape>;

/**
 * Format zod issues as "path: message".
 */
export function formatIssues(error: z.ZodError, prefix = ''): string[] {
	return error.issues.map(issue => {
		const path = issue.path.join('.');
		return `${prefix}${path || '(root)'}: ${issue.message}`;
	});
}

/**
 * Validate a submission, reporting every violated constraint.
 */
export function parseSubmission(
	input: unknown,
	now: Date = new Date(),
): DocumentSubmission {
	const parsed = createSubmissionSchema(now).safeParse(input);
	if (!parsed.success) {
		throw new ValidationError(formatIssues(parsed.error));
	}
	return parsed.data;
}
