/**
 * gNMI path strings.
 *
 * A path string looks like `/interfaces/interface[name=Ethernet1]/state/counters`.
 * `/` inside `[...]` does not split, and `\` escapes the next character.
 */

export interface PathElem {
  name: string;
  key: Record<string, string>;
}

export interface GnmiPath {
  /** Raw segments, still understood by targets older than gNMI 0.4. */
  element: string[];
  elem: PathElem[];
  origin?: string;
  target?: string;
}

export class PathSyntaxError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "PathSyntaxError";
  }
}

export function splitPath(path: string): string[] {
  const result: string[] = [];
  let rest = path.startsWith("/") ? path.slice(1) : path;
  while (rest.length > 0) {
    const end = nextTokenIndex(rest);
    result.push(rest.slice(0, end));
    rest = rest.slice(end);
    if (rest.startsWith("/")) rest = rest.slice(1);
  }
  return result;
}

function nextTokenIndex(path: string): number {
  let inBrackets = false;
  let escape = false;
  for (let i = 0; i < path.length; i++) {
    switch (path[i]) {
      case "[":
        inBrackets = true;
        escape = false;
        break;
      case "]":
        if (!escape) inBrackets = false;
        escape = false;
        break;
      case "\\":
        escape = !escape;
        break;
      case "/":
        if (!inBrackets && !escape) return i;
        escape = false;
        break;
      default:
        escape = false;
    }
  }
  return path.length;
}

/**
 * Returns the unescaped text before the first unescaped `find`, and the
 * index of that match in `s` (-1 when absent).
 */
function findUnescaped(s: string, find: string): { text: string; index: number } {
  let text = "";
  for (let i = 0; i < s.length; i++) {
    let ch = s[i];
    if (ch === find) return { text, index: i };
    if (ch === "\\" && i < s.length - 1) {
      i++;
      ch = s[i];
    }
    text += ch;
  }
  return { text, index: -1 };
}

export function parseElement(segment: string): PathElem {
  const { text: name, index: keyStart } = findUnescaped(segment, "[");
  if (keyStart < 0) {
    return { name, key: {} };
  }
  if (name.length === 0) {
    throw new PathSyntaxError(`failed to find element name in "${segment}"`);
  }

  const key: Record<string, string> = {};
  let keyPart = segment.slice(keyStart);
  while (keyPart !== "") {
    if (!keyPart.startsWith("[")) {
      throw new PathSyntaxError(`failed to find opening '[' in "${keyPart}"`);
    }
    const eq = findUnescaped(keyPart.slice(1), "=");
    if (eq.index < 0) {
      throw new PathSyntaxError(`failed to find '=' in "${keyPart}"`);
    }
    if (eq.text === "") {
      throw new PathSyntaxError(`failed to find key name in "${keyPart}"`);
    }
    const rhs = keyPart.slice(1 + eq.index + 1);
    const close = findUnescaped(rhs, "]");
    if (close.index < 0) {
      throw new PathSyntaxError(`failed to find ']' in "${keyPart}"`);
    }
    if (close.text === "") {
      throw new PathSyntaxError(`failed to find key value in "${keyPart}"`);
    }
    key[eq.text] = close.text;
    keyPart = rhs.slice(close.index + 1);
  }
  return { name, key };
}

export function parsePath(path: string): GnmiPath {
  const element = splitPath(path);
  return { element, elem: element.map(parseElement) };
}

export function formatPath(path: Pick<GnmiPath, "elem">): string {
  if (path.elem.length === 0) return "/";
  return path.elem
    .map((elem) => {
      const keys = Object.keys(elem.key)
        .sort()
        .map((k) => `[${escape(k, "=]")}=${escape(elem.key[k] ?? "", "]")}]`)
        .join("");
      return "/" + escape(elem.name, "/[") + keys;
    })
    .join("");
}

function escape(value: string, specials: string): string {
  let out = "";
  for (const ch of value) {
    out += ch === "\\" || specials.includes(ch) ? `\\${ch}` : ch;
  }
  return out;
}

export function pathsEqual(a: Pick<GnmiPath, "elem">, b: Pick<GnmiPath, "elem">): boolean {
  if (a.elem.length !== b.elem.length) return false;
  return a.elem.every((elem, i) => {
    const other = b.elem[i];
    if (!other || elem.name !== other.name) return false;
    const keys = Object.keys(elem.key);
    if (keys.length !== Object.keys(other.key).length) return false;
    return keys.every((k) => other.key[k] === elem.key[k]);
  });
}
