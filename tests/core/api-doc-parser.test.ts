import { describe, it, expect } from 'vitest';
import { readFileSync } from 'fs';
import { parseApiDocumentation, loadBlocks } from '../../src/core/api-doc-parser.js';
import {
  AmbiguousShapeError,
  MissingColumnError,
  StructureNotFoundError,
} from '../../src/types/errors.js';

const SAMPLE_PAGE = readFileSync(new URL('../fixtures/bot-api-sample.html', import.meta.url), 'utf-8');

function page(body: string): string {
  return `<html><body><div id="dev_page_content">${body}</div></body></html>`;
}

const USER_TABLE = `
  <table class="table">
    <thead><tr><th>Field</th><th>Type</th><th>Description</th></tr></thead>
    <tbody><tr><td>id</td><td>Integer</td><td>Unique identifier</td></tr></tbody>
  </table>
`;

describe('parseApiDocumentation', () => {
  describe('sample page', () => {
    it('should extract every type in document order', async () => {
      const schema = await parseApiDocumentation(SAMPLE_PAGE);
      expect(schema.types.map((type) => type.name)).toEqual([
        'User',
        'PhotoSize',
        'UserProfilePhotos',
        'CallbackGame',
        'ChatMember',
        'ForumTopicClosed',
      ]);
    });

    it('should extract every method in document order', async () => {
      const schema = await parseApiDocumentation(SAMPLE_PAGE);
      expect(schema.methods.map((method) => method.name)).toEqual(['getMe', 'sendMessage']);
    });

    it('should decode fields with normalized types and optional flags', async () => {
      const schema = await parseApiDocumentation(SAMPLE_PAGE);
      const user = schema.types.find((type) => type.name === 'User');

      expect(user).toEqual({
        kind: 'type',
        name: 'User',
        description: 'This object represents a Telegram user or bot.',
        fields: [
          { name: 'id', type: 'int64', optional: false, description: 'Unique identifier for this user or bot.' },
          { name: 'is_bot', type: 'bool', optional: false, description: 'True, if this user is a bot' },
          { name: 'username', type: 'String', optional: true, description: "Optional. User's or bot's username" },
        ],
      });
    });

    it('should normalize nested array types', async () => {
      const schema = await parseApiDocumentation(SAMPLE_PAGE);
      const photos = schema.types.find((type) => type.name === 'UserProfilePhotos');

      expect(photos?.fields.map((field) => [field.name, field.type])).toEqual([
        ['photos', 'array<array<PhotoSize>>'],
        ['total_count', 'int64'],
      ]);
    });

    it('should build enum-like types from lists', async () => {
      const schema = await parseApiDocumentation(SAMPLE_PAGE);
      const chatMember = schema.types.find((type) => type.name === 'ChatMember');

      expect(chatMember?.fields.map((field) => field.name)).toEqual(['ChatMemberMember', 'ChatMemberOwner']);
    });

    it('should keep field-less types and parameter-less methods', async () => {
      const schema = await parseApiDocumentation(SAMPLE_PAGE);

      expect(schema.types.find((type) => type.name === 'CallbackGame')?.fields).toEqual([]);
      expect(schema.methods[0]).toEqual({
        kind: 'method',
        name: 'getMe',
        description: "A simple method for testing your bot's authentication token. Requires no parameters.",
        parameters: [],
      });
    });

    it('should decode method parameters', async () => {
      const schema = await parseApiDocumentation(SAMPLE_PAGE);

      expect(schema.methods[1].parameters).toEqual([
        { name: 'chat_id', type: 'string', required: true, description: 'Unique identifier for the target chat' },
        { name: 'text', type: 'String', required: true, description: 'Text of the message to be sent' },
        { name: 'disable_notification', type: 'bool', required: false, description: 'Sends the message silently.' },
      ]);
    });

    it('should lose the trailing field-less type when flushing is off', async () => {
      const schema = await parseApiDocumentation(SAMPLE_PAGE, { flushTrailingDeclaration: false });
      expect(schema.types.map((type) => type.name)).not.toContain('ForumTopicClosed');
      expect(schema.types).toHaveLength(5);
    });
  });

  it('should yield exactly one type for a heading, paragraph and field table', async () => {
    const schema = await parseApiDocumentation(
      page(`<h4>User</h4><p>Represents a Telegram user.</p>${USER_TABLE}`)
    );

    expect(schema).toEqual({
      types: [
        {
          kind: 'type',
          name: 'User',
          description: 'Represents a Telegram user.',
          fields: [{ name: 'id', type: 'int64', optional: false, description: 'Unique identifier' }],
        },
      ],
      methods: [],
    });
  });

  it('should produce one field-less type for two headings around a paragraph', async () => {
    const schema = await parseApiDocumentation(
      page('<h4>Story</h4><p>This object represents a story.</p><h4>Next</h4>')
    );

    expect(schema.types).toEqual([
      { kind: 'type', name: 'Story', description: 'This object represents a story.', fields: [] },
    ]);
  });

  it('should fail with StructureNotFound without the content root', async () => {
    await expect(parseApiDocumentation('<html><body><h4>User</h4></body></html>')).rejects.toThrow(
      StructureNotFoundError
    );
  });

  it('should fail with MissingColumn when a row lacks the Type column', async () => {
    const html = page(`
      <h4>User</h4>
      <p>Represents a Telegram user.</p>
      <table class="table">
        <thead><tr><th>Field</th><th>Description</th></tr></thead>
        <tbody><tr><td>id</td><td>Unique identifier</td></tr></tbody>
      </table>
    `);

    await expect(parseApiDocumentation(html)).rejects.toThrow(MissingColumnError);
  });

  it('should fail with AmbiguousShape for a table and a list under one heading', async () => {
    const html = page(`<h4>User</h4><p>Represents a Telegram user.</p>${USER_TABLE}<ul><li>Other</li></ul>`);
    await expect(parseApiDocumentation(html)).rejects.toThrow(AmbiguousShapeError);
  });
});

describe('loadBlocks', () => {
  it('should return the classified blocks of a page', () => {
    const blocks = loadBlocks(page('<h4>User</h4><p>Text</p><div>skip</div>'));
    expect(blocks).toEqual([
      { kind: 'heading', text: 'User' },
      { kind: 'paragraph', text: 'Text' },
    ]);
  });
});
