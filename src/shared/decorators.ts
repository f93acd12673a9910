import 'reflect-metadata';

const INJECTABLE_METADATA_KEY = 'injectable';
const INJECT_METADATA_KEY = 'inject';

export interface InjectedParam {
  index: number;
  token: string;
}

export function Injectable(): ClassDecorator {
  return (target) => {
    Reflect.defineMetadata(INJECTABLE_METADATA_KEY, true, target);
  };
}

export function Inject(token: string): ParameterDecorator {
  return (target, _propertyKey, parameterIndex) => {
    const existing = getInjectedParams(target);
    Reflect.defineMetadata(
      INJECT_METADATA_KEY,
      [...existing, { index: parameterIndex, token }],
      target,
    );
  };
}

export function isInjectable(target: object): boolean {
  return Reflect.getMetadata(INJECTABLE_METADATA_KEY, target) === true;
}

export function getInjectedParams(target: object): InjectedParam[] {
  const params: unknown = Reflect.getMetadata(INJECT_METADATA_KEY, target);
  return Array.isArray(params) ? params.filter(isInjectedParam) : [];
}

function isInjectedParam(value: unknown): value is InjectedParam {
  return (
    typeof value === 'object' &&
    value !== null &&
    'index' in value &&
    typeof value.index === 'number' &&
    'token' in value &&
    typeof value.token === 'string'
  );
}
