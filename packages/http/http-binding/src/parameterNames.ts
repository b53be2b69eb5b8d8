const IDENTIFIER = /^[A-Za-z_$][\w$]*$/;

/**
 * Index just past the comment that starts at `i`, or `i` when none does.
 */
function skipComment(source: string, i: number): number {
    if (source[i] !== '/') {
        return i;
    }
    if (source[i + 1] === '/') {
        const end = source.indexOf('\n', i);
        return end < 0 ? source.length : end;
    }
    if (source[i + 1] === '*') {
        const end = source.indexOf('*/', i + 2);
        return end < 0 ? source.length : end + 2;
    }
    return i;
}

/**
 * Split the text between the outermost parentheses at top-level commas,
 * skipping over nested brackets, string literals and comments.
 */
function splitParameterList(source: string): string[] | undefined {
    let open = 0;
    while (open < source.length && source[open] !== '(') {
        const next = skipComment(source, open);
        open = next === open ? open + 1 : next;
    }
    if (open >= source.length) {
        return undefined;
    }

    const parts: string[] = [];
    let depth = 0;
    let quote: string | undefined;
    let current = '';

    for (let i = open + 1; i < source.length; i++) {
        const ch = source[i];
        if (quote) {
            current += ch;
            if (ch === '\\') {
                current += source[++i] ?? '';
            } else if (ch === quote) {
                quote = undefined;
            }
            continue;
        }
        const afterComment = skipComment(source, i);
        if (afterComment !== i) {
            current += ' ';
            i = afterComment - 1;
            continue;
        }
        if (ch === '"' || ch === "'" || ch === '`') {
            quote = ch;
        } else if (ch === '(' || ch === '[' || ch === '{') {
            depth++;
        } else if (ch === ')' || ch === ']' || ch === '}') {
            if (depth === 0) {
                parts.push(current);
                return parts.map((p) => p.trim()).filter((p, i, all) => p.length > 0 || i < all.length - 1);
            }
            depth--;
        } else if (ch === ',' && depth === 0) {
            parts.push(current);
            current = '';
            continue;
        }
        current += ch;
    }
    return undefined;
}

function parameterName(declaration: string): string | undefined {
    let name = declaration;
    const defaultAt = name.indexOf('=');
    if (defaultAt >= 0) {
        name = name.slice(0, defaultAt);
    }
    name = name.trim();
    if (name.startsWith('...')) {
        name = name.slice(3).trim();
    }
    return IDENTIFIER.test(name) ? name : undefined;
}

/**
 * Parameter names of a function, read from its source text.
 *
 * Destructured parameters have no name and come back as undefined. Returns
 * an empty array when the source cannot be read (native or bound functions).
 * A default value containing '=' inside a destructuring pattern is not a
 * concern since such parameters are unnamed anyway.
 */
export function parameterNames(fn: Function): (string | undefined)[] {
    const source: string = Function.prototype.toString.call(fn);
    if (source.includes('[native code]')) {
        return [];
    }
    const declarations = splitParameterList(source);
    if (!declarations) {
        return [];
    }
    return declarations.map(parameterName);
}
