export class ConflictingOpRegistrationError extends Error {
  name = "ConflictingOpRegistrationError";
}

export class FrozenOpRegistryError extends Error {
  name = "FrozenOpRegistryError";
}

export class UnknownOpError extends Error {
  name = "UnknownOpError";
}

export class InvalidOpAttrError extends Error {
  name = "InvalidOpAttrError";
}

export class CallArityError extends Error {
  name = "CallArityError";
}
