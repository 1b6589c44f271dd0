// Characters XML 1.0 cannot carry: C0 controls other than TAB/LF/CR, U+FFFE/U+FFFF and unpaired surrogates
const INVALID_XML_CHARS = /[\u0000-\u0008\u000B\u000C\u000E-\u001F\uFFFE\uFFFF]|[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/g;

export function stripInvalidXmlChars(text: string): string {
    return text.replace(INVALID_XML_CHARS, '');
}

export function findInvalidXmlChar(text: string): number {
    return text.search(INVALID_XML_CHARS);
}
