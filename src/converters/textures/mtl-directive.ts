/**
 * `.mtl` texture directive parsing
 *
 * `map_Kd -bm 0.5 -s 1 1 1 textures/skin.png` splits into the directive, its
 * options (kept verbatim) and the path, which may contain spaces.
 */

import { MTL_MAP_DIRECTIVES, MTL_OPTION_ARITY } from '../../constants/export';

export type MtlMapDirective = typeof MTL_MAP_DIRECTIVES[number];

export interface TextureDirective {
  directive: MtlMapDirective;
  options: string[];
  path: string;
}

const NUMERIC = /^[-+]?(\d+\.?\d*|\.\d+)([eE][-+]?\d+)?$/;

function isMapDirective(token: string): token is MtlMapDirective {
  return MTL_MAP_DIRECTIVES.some(directive => directive === token);
}

/**
 * Parse one line; `undefined` for anything that is not a texture directive
 * with a path
 */
export function parseTextureDirective(line: string): TextureDirective | undefined {
  const tokens = line.trim().split(/\s+/).filter(Boolean);
  const [directive, ...rest] = tokens;
  if (!directive || !isMapDirective(directive) || rest.length === 0) {
    return undefined;
  }

  const options: string[] = [];
  let index = 0;
  while (index < rest.length && MTL_OPTION_ARITY[rest[index]] !== undefined) {
    const option = rest[index];
    const arity = MTL_OPTION_ARITY[option];
    options.push(option);
    index++;
    // -o/-s/-t take one to three numbers; the rest take exactly their arity
    for (let taken = 0; taken < arity && index < rest.length - 1; taken++) {
      if (arity === 3 && taken > 0 && !NUMERIC.test(rest[index])) break;
      options.push(rest[index]);
      index++;
    }
  }

  const rawPath = rest.slice(index).join(' ').trim();
  if (!rawPath) {
    return undefined;
  }

  return {
    directive,
    options,
    path: rawPath.replace(/^["']|["']$/g, '').replace(/\\/g, '/'),
  };
}

export function formatTextureDirective(directive: TextureDirective, fileName: string): string {
  return [directive.directive, ...directive.options, fileName].join(' ');
}
