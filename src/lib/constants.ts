export const EOL = '\n';
export const DOUBLE_EOL = EOL + EOL;
export const INDENT = ' '.repeat(4);

/**
 * Names must be kebab-case: `route-on-attribute`, `lookup-service-v2`
 */
export const KEBAB_CASE_PATTERN = /^[a-z][a-z0-9]*(-[a-z0-9]+)*$/;
