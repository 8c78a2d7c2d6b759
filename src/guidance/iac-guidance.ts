import { InvalidSpecError } from '../errors';
import guidanceContent from './iac-guidance.json';

export const IAC_TOOLS = ['CloudFormation', 'SAM', 'CDK', 'Terraform'] as const;

export type IacTool = (typeof IAC_TOOLS)[number];

export interface IacToolInfo {
  name: string;
  description: string;
  bestFor: string[];
  pros: string[];
  cons: string[];
  gettingStarted: string;
  exampleCode: string;
}

export interface ComparisonTable {
  headers: string[];
  rows: Array<{ feature: string; cells: string[] }>;
}

export interface IacGuidance {
  title: string;
  overview: string;
  tools: IacToolInfo[];
  comparisonTable: ComparisonTable;
}

const content: {
  title: string;
  overview: string;
  tools: Record<IacTool, IacToolInfo>;
  comparisonTable: ComparisonTable;
} = guidanceContent;

export function resolveIacTool(name: string): IacTool {
  const tool = IAC_TOOLS.find(candidate => candidate.toLowerCase() === name.toLowerCase());
  if (!tool) {
    throw new InvalidSpecError(`Unknown IaC tool ${name}; expected one of ${IAC_TOOLS.join(', ')}`);
  }
  return tool;
}

/**
 * Guidance on IaC tools for serverless deployments, narrowed to one tool when
 * named
 */
export function iacGuidance(tool?: string): IacGuidance {
  const tools = tool === undefined ? [...IAC_TOOLS] : [resolveIacTool(tool)];
  return {
    title: content.title,
    overview: content.overview,
    tools: tools.map(name => content.tools[name]),
    comparisonTable: content.comparisonTable
  };
}
