export class MailConfigurationError extends Error {
  constructor(readonly problems: string[]) {
    super(
      `Email service not properly configured: ${problems.join(', ') || 'unknown problem'}`,
    );
    this.name = 'MailConfigurationError';
  }
}

export class InvalidRecipientError extends Error {
  constructor(recipient: string) {
    super(
      recipient
        ? `Invalid recipient email address: ${recipient}`
        : 'Recipient email address is required',
    );
    this.name = 'InvalidRecipientError';
  }
}

export class TemplateRenderError extends Error {
  constructor(template: string, reason: string) {
    super(`Failed to render email template '${template}': ${reason}`);
    this.name = 'TemplateRenderError';
  }
}

export class MailTransportError extends Error {
  constructor(
    message: string,
    readonly transient: boolean,
  ) {
    super(message);
    this.name = 'MailTransportError';
  }
}
