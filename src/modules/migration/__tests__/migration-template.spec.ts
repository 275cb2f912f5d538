import { nextMigrationTimestamp, renderMigration } from '../migration-template';

describe('migration template', () => {
  describe('nextMigrationTimestamp', () => {
    const now = new Date('2026-10-19T08:30:15.250Z');

    it('should use the current UTC time when it sorts last', () => {
      expect(nextMigrationTimestamp(['Migration20260101000000_initial'], now)).toBe('20261019083015');
      expect(nextMigrationTimestamp([], now)).toBe('20261019083015');
    });

    it('同一秒内生成时顺延一秒', () => {
      expect(nextMigrationTimestamp(['Migration20261019083015_initial'], now)).toBe('20261019083016');
    });

    it('should roll over minutes, days and years', () => {
      expect(nextMigrationTimestamp(['Migration20991231235959_future'], now)).toBe('21000101000000');
    });
  });

  describe('renderMigration', () => {
    it('should render a CommonJS migration class', () => {
      const source = renderMigration(
        'Migration20261019083015_widgets_table',
        ['create table "widgets" (id int);'],
        ['drop table "widgets";'],
        'js',
      );

      expect(source).toBe(
        [
          `'use strict';`,
          `Object.defineProperty(exports, '__esModule', { value: true });`,
          `exports.Migration20261019083015_widgets_table = void 0;`,
          `const { Migration } = require('@mikro-orm/migrations');`,
          '',
          'class Migration20261019083015_widgets_table extends Migration {',
          '',
          '  async up() {',
          '    this.addSql("create table \\"widgets\\" (id int);");',
          '  }',
          '',
          '  async down() {',
          '    this.addSql("drop table \\"widgets\\";");',
          '  }',
          '',
          '}',
          'exports.Migration20261019083015_widgets_table = Migration20261019083015_widgets_table;',
          '',
        ].join('\n'),
      );
    });

    it('should render a TypeScript migration class', () => {
      const source = renderMigration('Migration20261019083015_widgets', ['select 1;'], [], 'ts');

      expect(source.split('\n').slice(0, 6)).toEqual([
        `import { Migration } from '@mikro-orm/migrations';`,
        '',
        'export class Migration20261019083015_widgets extends Migration {',
        '',
        '  override async up(): Promise<void> {',
        '    this.addSql("select 1;");',
      ]);
    });
  });
});
