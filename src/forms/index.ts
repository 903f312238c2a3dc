export { getFormFields, isSecretKey, maskSecrets, SECRET_PREFIX, SECRET_MASK } from './FormFields.js';
export type { FormField, FormWidget } from './FormFields.js';
