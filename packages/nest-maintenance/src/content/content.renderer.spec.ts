import { renderMaintenanceContent, renderMaintenanceTemplate } from './content.renderer';

describe('renderMaintenanceTemplate', () => {
  it('replaces [[ name ]] placeholders and blanks unknown ones', () => {
    const template = '<h1>[[ title ]]</h1><p>[[.eta]]</p>[[missing]]';

    expect(renderMaintenanceTemplate(template, { title: 'Back soon', eta: '10 min' })).toBe(
      '<h1>Back soon</h1><p>10 min</p>',
    );
  });

  it('leaves other delimiters alone', () => {
    expect(renderMaintenanceTemplate('{{ title }} [title]', { title: 'x' })).toBe('{{ title }} [title]');
  });

  it('does not resolve inherited properties', () => {
    expect(renderMaintenanceTemplate('a[[ constructor ]]b', {})).toBe('ab');
  });
});

describe('renderMaintenanceContent', () => {
  it('returns the raw bytes when no variables are configured', () => {
    const content = Buffer.from('<p>[[ title ]]</p>');

    expect(renderMaintenanceContent(content, undefined)).toBe(content);
  });

  it('renders UTF-8 text when variables are configured', () => {
    const rendered = renderMaintenanceContent(Buffer.from('Zurück um [[ time ]]'), { time: '14:00' });

    expect(rendered.toString('utf-8')).toBe('Zurück um 14:00');
  });
});
