import { describe, it, expect, afterEach } from 'vitest';
import { BaseModelSettingsSchema } from '@domain/types/config.js';
import { ValidationError } from '@shared/lib/errors.js';
import { BaseModelResolver } from './base-model-resolver.js';
import { PreviewBaseModel } from './preview-base-model.js';
import { CommandBaseModel } from './command-base-model.js';

describe('BaseModelResolver', () => {
  afterEach(() => {
    BaseModelResolver.unregister('custom');
  });

  it('defaults to the preview model', () => {
    expect(BaseModelResolver.resolve(BaseModelSettingsSchema.parse({}))).toBeInstanceOf(PreviewBaseModel);
  });

  it('builds a command model from settings', () => {
    const settings = BaseModelSettingsSchema.parse({ type: 'command', command: 'fake-model' });
    expect(BaseModelResolver.resolve(settings, '/tmp')).toBeInstanceOf(CommandBaseModel);
  });

  it('requires a command for the command model', () => {
    const settings = BaseModelSettingsSchema.parse({ type: 'command' });
    expect(() => BaseModelResolver.resolve(settings)).toThrow(ValidationError);
  });

  it('lets an explicit type override the config', () => {
    const settings = BaseModelSettingsSchema.parse({ type: 'command', command: 'fake-model' });
    expect(BaseModelResolver.resolve(settings, '/tmp', 'preview')).toBeInstanceOf(PreviewBaseModel);
  });

  it('resolves registered models', () => {
    const custom = new PreviewBaseModel();
    BaseModelResolver.register('custom', () => custom);
    expect(BaseModelResolver.resolve(BaseModelSettingsSchema.parse({}), '/tmp', 'custom')).toBe(custom);
  });

  it('lists the valid names for an unknown model', () => {
    expect(() => BaseModelResolver.resolve(BaseModelSettingsSchema.parse({}), '/tmp', 'missing')).toThrow(
      'Unknown base model: "missing". Valid models are: preview, command',
    );
  });
});
