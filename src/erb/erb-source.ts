/**
 * ERB template masking
 *
 * Produces Ruby source of the same length as the template: template text
 * and comments become spaces (newlines kept), embedded code stays where
 * it was, and every closing `%>` becomes a `;`. Offsets and line/column
 * positions in the masked source therefore match the template.
 */

const OPEN_TAG = '<%';
const CLOSE_TAG = '%>';

/**
 * Replace every character but line breaks with a space
 */
function blank(text: string): string {
  return text.replace(/[^\r\n]/g, ' ');
}

export function maskErbTemplate(template: string): string {
  let output = '';
  let cursor = 0;

  while (cursor < template.length) {
    const open = template.indexOf(OPEN_TAG, cursor);
    if (open === -1) {
      output += blank(template.slice(cursor));
      break;
    }

    output += blank(template.slice(cursor, open));

    // `<%%` is a literal `<%` in the output
    if (template.startsWith('<%%', open)) {
      output += blank('<%%');
      cursor = open + 3;
      continue;
    }

    const marker = tagMarker(template, open + OPEN_TAG.length);
    const codeStart = open + OPEN_TAG.length + marker.length;
    const close = template.indexOf(CLOSE_TAG, codeStart);
    const codeEnd = close === -1 ? template.length : close;

    output += blank(template.slice(open, codeStart));

    const trimsRight = close !== -1 && codeEnd > codeStart && template[codeEnd - 1] === '-';
    const code = template.slice(codeStart, trimsRight ? codeEnd - 1 : codeEnd);

    if (marker === '#') {
      output += blank(template.slice(codeStart, codeEnd));
    } else {
      output += code;
      if (trimsRight) output += ' ';
    }

    if (close === -1) {
      break;
    }

    output += marker === '#' ? '  ' : '; ';
    cursor = close + CLOSE_TAG.length;
  }

  return output;
}

/**
 * Marker characters right after `<%`: '=', '==', '-', '#' or none
 */
function tagMarker(template: string, index: number): string {
  if (template.startsWith('==', index)) return '==';
  const next = template[index];
  if (next === '=' || next === '-' || next === '#') return next;
  return '';
}
