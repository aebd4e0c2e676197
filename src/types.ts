export const QUERY_OPTION_NAMES = ['$filter', 'search', '$top', '$skip'] as const;

export type QueryOptionName = (typeof QUERY_OPTION_NAMES)[number];
