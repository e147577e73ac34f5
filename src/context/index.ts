export { ContextAssembler, renderPrompt, formatItem, SECTION_ORDER, SECTION_CAPS } from './context-assembler'
export type {
  AssembledContext,
  BuildContextOptions,
  ContextAssemblerOptions,
  ContextSection,
  SectionName,
} from './context-assembler'
