import { describe, it, expect } from 'vitest';
import { Message } from '../../src/html/message.js';

describe('Message', () => {
  it('fills sequential placeholders', () => {
    expect(new Message('Showing rows %s - %s').addParam(0).addParam(24).getMessage()).toBe('Showing rows 0 - 24');
  });

  it('fills positional placeholders', () => {
    expect(new Message('%2$s then %1$s').addParam('a').addParam('b').getMessage()).toBe('b then a');
  });

  it('unescapes doubled percent signs', () => {
    expect(new Message('100%% done').getMessage()).toBe('100% done');
  });

  it('escapes raw text', () => {
    const message = Message.rawText('50% <b>', 'error');
    expect(message.getMessage()).toBe('50% &lt;b&gt;');
    expect(message.isError()).toBe(true);
  });

  it('appends text and messages', () => {
    const message = Message.success()
      .addText('<x>')
      .addMessage(Message.notice('(%s)').addParam('y'), '<br>');
    expect(message.getMessage()).toBe('Your SQL query has been executed successfully. &lt;x&gt;<br>(y)');
  });

  it('renders an alert per level', () => {
    expect(Message.notice('hi').getDisplay()).toBe('<div class="alert alert-primary" role="alert">hi</div>\n');
    expect(Message.error('no').getDisplay()).toBe('<div class="alert alert-danger" role="alert">no</div>\n');
  });
});
