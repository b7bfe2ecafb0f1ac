import type { FrozenAdaptationConfig } from '@domain/types/config.js';
import type { IBaseModel } from '@domain/ports/base-model.js';
import { ValidationError } from '@shared/lib/errors.js';
import { logger } from '@shared/lib/logger.js';
import { PreviewBaseModel } from './preview-base-model.js';
import { CommandBaseModel } from './command-base-model.js';

type BaseModelSettings = FrozenAdaptationConfig['baseModel'];
type BaseModelFactory = (settings: BaseModelSettings, cwd: string) => IBaseModel;

/**
 * Resolves the base model binding named by `baseModel.type` in the config.
 *
 * External code can add bindings without touching this file:
 *
 *   BaseModelResolver.register('my-model', (settings) => new MyModel(settings));
 */
export class BaseModelResolver {
  private static readonly registry = new Map<string, BaseModelFactory>([
    ['preview', () => new PreviewBaseModel()],
    [
      'command',
      (settings, cwd) => {
        if (!settings.command) {
          throw new ValidationError('baseModel.command is required when baseModel.type is "command"', [
            { path: ['baseModel', 'command'], message: 'Required' },
          ]);
        }
        return new CommandBaseModel({
          command: settings.command,
          args: settings.args,
          cwd,
          timeoutMs: settings.timeoutMs,
        });
      },
    ],
  ]);

  /**
   * Register a new model factory under the given name.
   * Warns when overwriting an existing registration.
   */
  static register(name: string, factory: BaseModelFactory): void {
    if (BaseModelResolver.registry.has(name)) {
      logger.warn(`BaseModelResolver: overwriting existing registration for model "${name}".`);
    }
    BaseModelResolver.registry.set(name, factory);
  }

  /** Remove a registered factory. Primarily for test cleanup. */
  static unregister(name: string): void {
    BaseModelResolver.registry.delete(name);
  }

  /**
   * @param type - Overrides `settings.type`, e.g. from a CLI flag.
   * @throws Error if the model name is not registered.
   */
  static resolve(settings: BaseModelSettings, cwd: string = process.cwd(), type: string = settings.type): IBaseModel {
    const factory = BaseModelResolver.registry.get(type);

    if (!factory) {
      const validList = [...BaseModelResolver.registry.keys()].join(', ');
      throw new Error(`Unknown base model: "${type}". Valid models are: ${validList}`);
    }

    return factory(settings, cwd);
  }
}
