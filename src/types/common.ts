/**
 * Common type definitions shared by tools and resources.
 */

export interface TextContent {
  type: 'text';
  text: string;
}

export interface ToolResponse {
  content: TextContent[];
  isError?: boolean;
  [key: string]: unknown;
}
