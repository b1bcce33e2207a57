/**
 * # Binds a config property to an environment variable
 *
 * The variable is read on first access and cached per instance, so a
 * constructed config does not change when the environment does.
 */
export const UseEnv =
  <TProperty = string | undefined>(
    key: string,
    transform?: (raw?: string) => TProperty,
  ): PropertyDecorator =>
  (proto, propertyKey) => {
    const computed = new WeakMap<object, TProperty | string | undefined>();

    Object.defineProperty(proto, propertyKey, {
      enumerable: true,
      get(this: object) {
        if (computed.has(this)) {
          return computed.get(this);
        }

        const raw = process.env[key];
        let value: TProperty | string | undefined = raw;

        if (transform) {
          try {
            value = transform(raw);
          } catch (err) {
            throw new Error(`Failed to transform config ${key}: ${err}`);
          }
        }

        computed.set(this, value);
        return value;
      },
    });
  };
