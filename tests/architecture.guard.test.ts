import { describe, it, expect } from 'vitest';
import fs from 'node:fs';
import path from 'node:path';

const planeRules: Array<{ root: string; forbidden: string[] }> = [
  {
    root: path.join(__dirname, '..', 'src', 'infra'),
    forbidden: ['observability', 'cli', 'apps'],
  },
  {
    root: path.join(__dirname, '..', 'src', 'observability'),
    forbidden: ['cli', 'apps'],
  },
  {
    root: path.join(__dirname, '..', 'src', 'cli'),
    forbidden: ['apps'],
  },
];

function listFiles(dir: string): string[] {
  if (!fs.existsSync(dir)) return [];
  const entries = fs.readdirSync(dir, { withFileTypes: true });
  const files: string[] = [];
  for (const e of entries) {
    const full = path.join(dir, e.name);
    if (e.isDirectory()) files.push(...listFiles(full));
    else if (e.isFile() && (full.endsWith('.ts') || full.endsWith('.tsx'))) files.push(full);
  }
  return files;
}

function findImports(content: string): string[] {
  const imports: string[] = [];
  const regex = /import[^;]*from\s+['"]([^'"]+)['"]/g;
  let m: RegExpExecArray | null;
  while ((m = regex.exec(content))) {
    imports.push(m[1]);
  }
  return imports;
}

describe('Architecture guard: no direct cross-plane imports', () => {
  it('rejects forbidden imports across planes', () => {
    const violations: Array<{ file: string; target: string }> = [];

    for (const rule of planeRules) {
      const files = listFiles(rule.root);
      for (const file of files) {
        const content = fs.readFileSync(file, 'utf8');
        const imports = findImports(content);
        for (const imp of imports) {
          for (const ban of rule.forbidden) {
            // forbid segments like ../apps, /apps, or @/apps
            if (imp.includes(`/${ban}`) || imp.includes(`../${ban}`) || imp.startsWith(`${ban}/`) || imp === ban) {
              violations.push({ file, target: imp });
            }
          }
        }
      }
    }

    const message = violations
      .map((v) => `${path.relative(path.join(__dirname, '..'), v.file)} imports ${v.target}`)
      .join('\n');
    expect(violations, message || 'No cross-plane imports detected').toHaveLength(0);
  });
});
