export function deepFreeze<T>(value: T): T {
  if (typeof value !== "object" || value === null) {
    return value;
  }
  if (Object.isFrozen(value)) {
    return value;
  }
  if (value instanceof Map) {
    value.forEach((entry) => deepFreeze(entry));
    return Object.freeze(value);
  }
  if (Array.isArray(value)) {
    value.forEach((item) => deepFreeze(item));
  } else {
    Object.getOwnPropertyNames(value).forEach((key) => {
      const descriptor = Object.getOwnPropertyDescriptor(value, key);
      if (descriptor && "value" in descriptor) {
        deepFreeze(descriptor.value);
      }
    });
  }
  return Object.freeze(value);
}
