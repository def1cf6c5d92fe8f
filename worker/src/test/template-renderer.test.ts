import assert from 'node:assert/strict';
import { describe, it } from 'node:test';
import { MemoryCampaignRepository } from '../core/campaign-repository';
import { PlaceholderTemplateRenderer } from '../core/template-renderer';
import { RenderError } from '../domain/errors';

function renderer(): PlaceholderTemplateRenderer {
  const templates = new MemoryCampaignRepository();
  templates.addTemplate({
    id: 'greeting',
    subject: 'Hi {{ first_name | there }}',
    html: '<p>{{first_name|there}} from {{custom.company}}</p>',
    text: '{{first_name | there}} from {{custom.company}}'
  });
  templates.addTemplate({ id: 'strict', subject: 'Hello', html: '<p>{{plan}}</p>', requiredFields: ['plan'] });
  return new PlaceholderTemplateRenderer(templates);
}

describe('PlaceholderTemplateRenderer', () => {
  it('substitutes fields and escapes them only in html', async () => {
    const rendered = await renderer().render('greeting', { first_name: 'Ana', company: 'R&D <Labs>' });

    assert.deepEqual(rendered, {
      subject: 'Hi Ana',
      html: '<p>Ana from R&amp;D &lt;Labs&gt;</p>',
      text: 'Ana from R&D <Labs>'
    });
  });

  it('uses the fallback for absent or empty fields', async () => {
    const rendered = await renderer().render('greeting', { first_name: '', company: 'Acme' });

    assert.equal(rendered.subject, 'Hi there');
    assert.equal(rendered.text, 'there from Acme');
  });

  it('fails on a placeholder without a value or fallback', async () => {
    await assert.rejects(renderer().render('greeting', { first_name: 'Ana' }), (error: unknown) => {
      assert.ok(error instanceof RenderError);
      assert.equal(error.missingField, 'custom.company');
      assert.equal(error.message, 'missing_field:custom.company');
      return true;
    });
  });

  it('checks required fields before rendering', async () => {
    await assert.rejects(renderer().render('strict', {}), /missing_field:plan/);
  });

  it('fails for an unknown template', async () => {
    await assert.rejects(renderer().render('nope', {}), /template_not_found:nope/);
  });
});
