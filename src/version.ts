// Kept in step with package.json; written into every output artifact
export const VERSION = '0.1.0';
