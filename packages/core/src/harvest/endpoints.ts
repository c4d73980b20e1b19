/**
 * Harvest v1 paths, keyed by the names the catalog uses.
 * Related paths take the parent record id in place of `{rel_id}`.
 */

export const DEFAULT_BASE_URL = 'https://harvest.greenhouse.io/v1/';

export const DIRECT_ENDPOINTS: Readonly<Record<string, string>> = {
  applications: 'applications',
  candidates: 'candidates',
  close_reasons: 'close_reasons',
  custom_fields: 'custom_fields',
  degrees: 'degrees',
  demographics_answer_options: 'demographics/answer_options',
  demographics_answers: 'demographics/answers',
  demographics_question_sets: 'demographics/question_sets',
  demographics_questions: 'demographics/questions',
  departments: 'departments',
  interviews: 'scheduled_interviews',
  job_posts: 'job_posts',
  job_stages: 'job_stages',
  jobs: 'jobs',
  offers: 'offers',
  rejection_reasons: 'rejection_reasons',
  scorecards: 'scorecards',
  sources: 'sources',
  users: 'users'
};

export const RELATED_ENDPOINTS: Readonly<Record<string, Readonly<Record<string, string>>>> = {
  applications: {
    demographics_answers: 'applications/{rel_id}/demographics/answers',
    interviews: 'applications/{rel_id}/scheduled_interviews',
    offers: 'applications/{rel_id}/offers',
    scorecards: 'applications/{rel_id}/scorecards'
  },
  candidates: {
    applications: 'candidates/{rel_id}/applications'
  },
  // Harvest nests answer options under questions; the answer id stands in for it
  demographics_answers: {
    answer_options: 'demographics/questions/{rel_id}/answer_options'
  },
  demographics_question_sets: {
    questions: 'demographics/question_sets/{rel_id}/questions'
  },
  jobs: {
    openings: 'jobs/{rel_id}/openings',
    stages: 'jobs/{rel_id}/stages'
  }
};

export function relatedPath(resource: string, relation: string, parentId: string): string | undefined {
  const template = RELATED_ENDPOINTS[resource]?.[relation];
  return template?.replace('{rel_id}', encodeURIComponent(parentId));
}
