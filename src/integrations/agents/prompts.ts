/**
 * Prompt templates for the model-backed planner and code generator.
 */

import type { AgentDescriptor, CatalogAgent, DatasetSummary } from '../orchestration/types.js';

const MAX_PROMPT_COLUMNS = 60;

export const PLANNER_SYSTEM_PROMPT =
  'You are an expert data analyst. You select specialised analysis agents for a request and answer with JSON only.';

export const CODEGEN_SYSTEM_PROMPT =
  'You are a Python data analysis expert. You write complete, runnable scripts and answer with a single fenced code block.';

/**
 * Render a dataset summary as a compact block for either prompt.
 */
export function describeDataset(summary: DatasetSummary): string {
  const lines = [
    `- File: ${summary.fileName}`,
    `- Format: ${summary.format}`,
    `- Rows: ${summary.rowCount}`,
    `- Columns: ${summary.columns.length}`,
  ];

  const shown = summary.columns.slice(0, MAX_PROMPT_COLUMNS);
  if (shown.length > 0) {
    lines.push('', '| column | type | missing | samples |', '|---|---|---|---|');
    for (const column of shown) {
      lines.push(`| ${column.name} | ${column.type} | ${column.missing} | ${column.samples.join(', ')} |`);
    }
  }
  if (summary.columns.length > shown.length) {
    lines.push(`(${summary.columns.length - shown.length} more columns omitted)`);
  }
  return lines.join('\n');
}

export function buildPlannerPrompt(
  summary: DatasetSummary,
  question: string,
  catalog: readonly CatalogAgent[],
  maxAgents: number,
): string {
  const agents = catalog
    .map((agent) => `- **${agent.id}**: ${agent.description} (specialties: ${agent.specialties.join(', ')})`)
    .join('\n');

  return `**Data Overview:**
${describeDataset(summary)}

**User's Analysis Request:**
"${question}"

**Available Agents:**
${agents}

**Instructions:**
- Select at most ${maxAgents} agents that directly address the request and fit the available columns.
- Consider data cleaning first when missing values are evident.
- Order them in the sequence they should run.

Respond with ONLY a JSON array of agent ids, for example: ["data_cleaning", "statistical_analysis"]`;
}

export function buildCodegenPrompt(agent: AgentDescriptor, summary: DatasetSummary, question: string): string {
  return `**Agent: ${agent.displayName}** (${agent.id})
${agent.description}

**Data Information:**
${describeDataset(summary)}

**User Question:**
"${question}"

**Requirements:**
1. Read the dataset from the path given as the first command-line argument (also in the DATASET_PATH environment variable).
2. Use only pandas, numpy and the standard library. Do not read from the network or write outside the working directory.
3. Perform the analysis this agent specialises in, aimed at the user question.
4. Print progress or tables freely, but the LAST line of output must be one JSON object:
   {"narrative": "...", "insights": ["..."], "recommendations": ["..."], "artifacts": [{"name": "...", "type": "text/csv", "data": "..."}]}
5. Exit with a non-zero status if the analysis cannot be completed.

Respond with the complete script in a single \`\`\`python code block.`;
}
