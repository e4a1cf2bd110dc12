/**
 * @mdadf/core: input validation shared by the mdadf tools.
 */

export {
  JsonValueSchema,
  AdfAttrsSchema,
  AdfMarkSchema,
  AdfNodeSchema,
  AdfDocumentSchema,
  MdAdfConfigSchema,
} from './schemas';
export type { MdAdfConfig } from './schemas';
export { SchemaValidationError, describeIssues, parseWithSchema } from './errors';
