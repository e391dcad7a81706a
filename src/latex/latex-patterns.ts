// Command name alternations shared by the label and reference patterns
export const REF_CMDS = 'ref|eqref|pageref|autoref|cref|Cref|nameref'
export const LABEL_CMDS = 'label'

/** Reference commands a session may insert as its skeleton. */
export const REFERENCE_COMMANDS = REF_CMDS.split('|')

/** `\label{...}` with one level of nested braces inside the argument */
export const LABEL_PATTERN = new RegExp(
  `\\\\(?:${LABEL_CMDS})\\s*\\{(?:[^{}]|\\{[^{}]*\\})*\\}`,
  'g',
)

/** Reference command name immediately before an opening brace */
export const REF_BEFORE_BRACE_RE = new RegExp(`\\\\(?:${REF_CMDS})\\*?\\s*(?:\\[[^\\]]*\\])?\\s*$`)

/** Build the reference skeleton inserted at the origin, e.g. `\ref{} ` */
export function referenceSkeleton(command: string): { text: string; identifierOffset: number } {
  const head = `\\${command}{`
  return { text: `${head}} `, identifierOffset: head.length }
}
