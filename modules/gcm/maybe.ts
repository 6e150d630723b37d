export type Maybe<T> =
  | { readonly kind: "present"; readonly value: T }
  | { readonly kind: "absent" };

export const present = <T>(value: T): Maybe<T> => ({ kind: "present", value });

export const absent: Maybe<never> = { kind: "absent" };
