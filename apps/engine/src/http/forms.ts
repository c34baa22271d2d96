/**
 * Request body parsing for the generate endpoints
 */

import { z } from 'zod';
import { InvalidRequestError } from '../errors';
import { RequestContext } from '../pipeline/types';

const required = z.string().trim().min(1);
const optional = z.string().trim().optional().default('');

export const generateFormSchema = z.object({
    topic: required,
    target_communities: required,
    industry: required,
    target_audience: required,
    business_type: required,
    content_goal: required,
    unique_value_prop: required,
    brand_voice: required,
    customer_pain_points: required,
    frequent_questions: required,
    success_story: optional,
});

/**
 * "r/laptops, buildapc ,, r/college" -> ["laptops", "buildapc", "college"]
 */
export function parseCommunities(value: string): string[] {
    return value
        .split(',')
        .map(community => community.trim().replace(/^\/?r\//i, ''))
        .filter(community => community.length > 0);
}

/**
 * Validate a submitted form into a RequestContext.
 * Throws InvalidRequestError naming the first missing or empty field.
 */
export function parseGenerateForm(body: unknown): RequestContext {
    const parsed = generateFormSchema.safeParse(body ?? {});
    if (!parsed.success) {
        const issue = parsed.error.issues[0];
        const field = issue && issue.path.length > 0 ? String(issue.path[0]) : 'form';
        throw new InvalidRequestError(field);
    }

    const form = parsed.data;
    const targetCommunities = parseCommunities(form.target_communities);
    if (targetCommunities.length === 0) {
        throw new InvalidRequestError('target_communities');
    }

    return {
        topic: form.topic,
        targetCommunities,
        businessContext: {
            industry: form.industry,
            targetAudience: form.target_audience,
            businessType: form.business_type,
            contentGoal: form.content_goal,
            uniqueValueProp: form.unique_value_prop,
            brandVoice: form.brand_voice,
        },
        humanInputs: {
            customerPainPoints: form.customer_pain_points,
            frequentQuestions: form.frequent_questions,
            successStory: form.success_story,
        },
    };
}
