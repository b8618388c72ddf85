export type { QuestionGenerator, GenerateOptions } from './types.js';
export { HttpQuestionGenerator } from './HttpQuestionGenerator.js';
export type { HttpGeneratorConfig, GenerateRequestBody } from './HttpQuestionGenerator.js';
