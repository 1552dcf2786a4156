import type { FastifySchema } from 'fastify';

const skillList = {
  type: 'array',
  items: { type: 'string', maxLength: 200 },
  maxItems: 200
};

const learnerParams = {
  type: 'object',
  required: ['learnerId'],
  properties: {
    learnerId: { type: 'string', minLength: 1, maxLength: 128 }
  }
};

export const classifySchema: FastifySchema = {
  body: {
    type: 'object',
    required: ['skills'],
    properties: {
      skills: skillList,
      title: { type: 'string', maxLength: 200 }
    },
    additionalProperties: false
  }
};

export const codeDescriptionSchema: FastifySchema = {
  params: {
    type: 'object',
    required: ['code'],
    properties: {
      code: { type: 'string', minLength: 1, maxLength: 16 }
    }
  }
};

export const fitSchema: FastifySchema = {
  body: {
    type: 'object',
    required: ['learnerCode', 'jobCode'],
    properties: {
      learnerCode: { type: 'string', minLength: 1, maxLength: 16 },
      jobCode: { type: 'string', minLength: 1, maxLength: 16 }
    },
    additionalProperties: false
  }
};

export const skillGapSchema: FastifySchema = {
  body: {
    type: 'object',
    required: ['learnerSkills', 'requiredSkills'],
    properties: {
      learnerSkills: skillList,
      requiredSkills: { type: 'string', maxLength: 20000 }
    },
    additionalProperties: false
  }
};

export const turnSchema: FastifySchema = {
  params: learnerParams
};

export const toolCallSchema: FastifySchema = {
  params: learnerParams,
  body: {
    type: 'object',
    required: ['toolName'],
    properties: {
      toolName: { type: 'string', minLength: 1, maxLength: 100 },
      arguments: { type: 'object' }
    },
    additionalProperties: false
  }
};

export const bestFitJobsSchema: FastifySchema = {
  params: learnerParams,
  body: {
    type: 'object',
    properties: {
      limit: { type: 'integer', minimum: 1, maximum: 100 },
      minMatchPercent: { type: 'number', minimum: 0, maximum: 100 }
    },
    additionalProperties: false
  }
};
