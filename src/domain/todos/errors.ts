export class DomainError extends Error {
  constructor(message: string) {
    super(message);
    this.name = this.constructor.name;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class InvalidTitleError extends DomainError {
  constructor(message = 'Title cannot be empty') {
    super(message);
  }
}

export class InvalidDescriptionError extends DomainError {
  constructor(message = 'Description is too long') {
    super(message);
  }
}

export class EmptyUpdateError extends DomainError {
  constructor(message = 'At least one of title, description or completed must be provided') {
    super(message);
  }
}
