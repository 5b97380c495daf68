import { OUTLINE_RENDERER } from '@outline-tree/outline-renderer';

export const PROGRAM_NAME = 'pdf-outline-tree';

export const USAGE = `Usage: ${PROGRAM_NAME} [options] <path/to/file.pdf>`;

export const HELP_HINT = `Try '${PROGRAM_NAME} --help' for more information.`;

export const HELP_TEXT = [
  USAGE,
  '    -d, --depth LEVEL        Display only LEVEL levels of hierarchy',
  '    -t, --tree               Display output in tree format instead of Markdown list',
  `    -i, --indent SPACES      Set indent spacing (default: ${OUTLINE_RENDERER.DEFAULT_INDENT})`,
  '    -v, --verbose            Log diagnostics to stderr',
  '    -h, --help               Show this help message',
  '',
  'Description:',
  '  Extracts and displays the outline (bookmarks) of a PDF file',
  '  in a hierarchical format (Markdown list by default, or tree format with -t).',
  '',
  'Examples:',
  `  ${PROGRAM_NAME} document.pdf               # Show all levels in Markdown`,
  `  ${PROGRAM_NAME} -t document.pdf            # Show all levels in tree format`,
  `  ${PROGRAM_NAME} -d 2 document.pdf          # Show only 2 levels in Markdown`,
  `  ${PROGRAM_NAME} -t -d 2 document.pdf       # Show only 2 levels in tree format`,
  `  ${PROGRAM_NAME} -i 4 document.pdf          # Use 4-space indent`,
  '',
  'Notes:',
  '  Encrypted PDFs are read without decryption, so their titles may print',
  '  garbled even when no password is needed to open them.',
  '',
  'Environment:',
  '  OUTLINE_TREE_LOG_LEVEL   debug, info, warn, error or silent (default: warn)',
].join('\n');
