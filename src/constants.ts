/**
 * Special node ID representing the start of a workflow
 */
export const START = '__START__' as const;

/**
 * Special node ID representing the successful end of a workflow
 */
export const END = '__END__' as const;

/**
 * Special node ID a router returns to stop a workflow as cancelled
 */
export const CANCELLED = '__CANCELLED__' as const;
