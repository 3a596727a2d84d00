const MEMORY_NAME = 'mem';

function isWordChar(char: string | undefined): boolean {
    if (char === undefined) return false;
    return (char >= 'a' && char <= 'z')
        || (char >= 'A' && char <= 'Z')
        || (char >= '0' && char <= '9')
        || char === '_';
}

/** Caret is always exponentiation; there is no XOR. */
export function rewriteCaret(text: string): string {
    return text.split('^').join('**');
}

/**
 * Turns a bare `mem` into the call `mem()`.
 * `memory`, `xmem` and `mem(` (also `mem (`) are left alone.
 */
export function rewriteBareMemory(text: string): string {
    let out = '';
    let i = 0;

    while (i < text.length) {
        if (text.startsWith(MEMORY_NAME, i) && !isWordChar(text[i - 1])) {
            const after = i + MEMORY_NAME.length;
            if (!isWordChar(text[after])) {
                let next = after;
                while (text[next] === ' ' || text[next] === '\t') next++;
                out += text[next] === '(' ? MEMORY_NAME : `${MEMORY_NAME}()`;
                i = after;
                continue;
            }
        }
        out += text[i];
        i++;
    }

    return out;
}

export function normalize(text: string): string {
    return rewriteBareMemory(rewriteCaret(text));
}
