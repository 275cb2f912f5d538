export type MigrationEmit = 'ts' | 'js';

// same layout as the files `@mikro-orm/migrations` generates
function renderBody(statements: readonly string[]): string {
  return statements.map((sql) => `    this.addSql(${JSON.stringify(sql)});`).join('\n');
}

/**
 * Source of a hand-written migration class, for SQL the entity diff cannot
 * produce (functions, triggers).
 */
export function renderMigration(
  className: string,
  up: readonly string[],
  down: readonly string[],
  emit: MigrationEmit,
): string {
  if (emit === 'ts') {
    return [
      `import { Migration } from '@mikro-orm/migrations';`,
      '',
      `export class ${className} extends Migration {`,
      '',
      '  override async up(): Promise<void> {',
      renderBody(up),
      '  }',
      '',
      '  override async down(): Promise<void> {',
      renderBody(down),
      '  }',
      '',
      '}',
      '',
    ].join('\n');
  }

  return [
    `'use strict';`,
    `Object.defineProperty(exports, '__esModule', { value: true });`,
    `exports.${className} = void 0;`,
    `const { Migration } = require('@mikro-orm/migrations');`,
    '',
    `class ${className} extends Migration {`,
    '',
    '  async up() {',
    renderBody(up),
    '  }',
    '',
    '  async down() {',
    renderBody(down),
    '  }',
    '',
    '}',
    `exports.${className} = ${className};`,
    '',
  ].join('\n');
}

const TIMESTAMP = /\d{14}/;

function formatTimestamp(date: Date): string {
  return date.toISOString().replace(/[-T:]|\.\d{3}z$/gi, '');
}

function parseTimestamp(timestamp: string): Date {
  const [year, month, day, hour, minute, second] = [0, 4, 6, 8, 10, 12].map((start, index) =>
    Number(timestamp.slice(start, start + (index === 0 ? 4 : 2))),
  );
  return new Date(Date.UTC(year, month - 1, day, hour, minute, second));
}

/**
 * A `yyyyMMddHHmmss` (UTC) timestamp that sorts after every known migration,
 * even one generated within the same second.
 */
export function nextMigrationTimestamp(knownMigrations: readonly string[], now: Date = new Date()): string {
  const latest = knownMigrations
    .map((name) => TIMESTAMP.exec(name)?.[0])
    .filter((timestamp): timestamp is string => timestamp !== undefined)
    .sort()
    .pop();

  const candidate = formatTimestamp(now);
  if (latest === undefined || candidate > latest) {
    return candidate;
  }
  return formatTimestamp(new Date(parseTimestamp(latest).getTime() + 1000));
}
