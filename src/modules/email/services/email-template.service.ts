/**
 * EmailTemplateService
 *
 * HTML and plain-text rendering for every club email. All templates share
 * one layout with a header band, content area and footer linking back to
 * the club site.
 */

import { Injectable } from '@nestjs/common';
import { TemplateRenderError } from '../errors/mail.errors';

export enum EmailTemplate {
  REGISTRATION_CONFIRMATION = 'registration-confirmation',
  STAFF_NEW_REGISTRATION = 'staff-new-registration',
  MEMBER_APPROVED = 'member-approved',
  MEMBER_REJECTED = 'member-rejected',
  PICTURE_REMINDER = 'picture-reminder',
  ANNOUNCEMENT = 'announcement',
  CONTACT_MESSAGE = 'contact-message',
  TEST_EMAIL = 'test-email',
}

export type EmailContext = Record<string, unknown>;

export interface RenderedEmail {
  html: string;
  text: string;
}

const CLUB_NAME = 'ICT Club';

const TEMPLATE_IDS: ReadonlySet<string> = new Set<string>(Object.values(EmailTemplate));

export function isEmailTemplate(value: string): value is EmailTemplate {
  return TEMPLATE_IDS.has(value);
}

@Injectable()
export class EmailTemplateService {
  /**
   * Render a template with data.
   * Throws TemplateRenderError for an unknown template or a missing field.
   */
  render(template: string, data: EmailContext): RenderedEmail {
    if (!isEmailTemplate(template)) {
      throw new TemplateRenderError(template, 'unknown template');
    }

    switch (template) {
      case EmailTemplate.REGISTRATION_CONFIRMATION:
        return this.renderRegistrationConfirmation(data);
      case EmailTemplate.STAFF_NEW_REGISTRATION:
        return this.renderStaffNewRegistration(data);
      case EmailTemplate.MEMBER_APPROVED:
        return this.renderMemberApproved(data);
      case EmailTemplate.MEMBER_REJECTED:
        return this.renderMemberRejected(data);
      case EmailTemplate.PICTURE_REMINDER:
        return this.renderPictureReminder(data);
      case EmailTemplate.ANNOUNCEMENT:
        return this.renderAnnouncement(data);
      case EmailTemplate.CONTACT_MESSAGE:
        return this.renderContactMessage(data);
      case EmailTemplate.TEST_EMAIL:
        return this.renderTestEmail(data);
    }
  }

  /**
   * HTML-escape user-provided data so it cannot inject markup into the email.
   */
  escapeHtml(str: string): string {
    if (!str) return '';
    return String(str)
      .replace(/&/g, '&amp;')
      .replace(/</g, '&lt;')
      .replace(/>/g, '&gt;')
      .replace(/"/g, '&quot;')
      .replace(/'/g, '&#039;');
  }

  private stringify(value: unknown): string {
    if (value instanceof Date) {
      return value.toUTCString();
    }
    if (typeof value === 'string') {
      return value;
    }
    if (typeof value === 'number' || typeof value === 'boolean') {
      return String(value);
    }
    return '';
  }

  private required(template: EmailTemplate, data: EmailContext, key: string): string {
    const value = this.stringify(data[key]).trim();
    if (!value) {
      throw new TemplateRenderError(template, `missing required field '${key}'`);
    }
    return value;
  }

  private optional(data: EmailContext, key: string, fallback = ''): string {
    return this.stringify(data[key]).trim() || fallback;
  }

  private wrapInLayout(headerContent: string, bodyContent: string, data: EmailContext): string {
    const siteUrl = this.escapeHtml(this.optional(data, 'siteUrl', '#'));

    return `<!DOCTYPE html>
<html>
<head>
  <meta charset="utf-8">
  <meta name="viewport" content="width=device-width, initial-scale=1">
  <style>
    body { font-family: Arial, sans-serif; line-height: 1.6; color: #333; margin: 0; padding: 0; background-color: #f5f5f5; }
    .container { max-width: 600px; margin: 0 auto; padding: 20px; }
    .header { background: #0b3d91; color: white; padding: 30px; text-align: center; border-radius: 8px 8px 0 0; }
    .content { background: white; padding: 30px; border-radius: 0 0 8px 8px; }
    .button { display: inline-block; background: #0b3d91; color: white; padding: 12px 24px; text-decoration: none; border-radius: 6px; margin-top: 20px; }
    .footer { text-align: center; margin-top: 30px; color: #6b7280; font-size: 12px; padding: 20px; }
    .footer a { color: #0b3d91; }
    .alert-box-warning { background: #fef3c7; border-left: 4px solid #f59e0b; padding: 16px; margin: 20px 0; border-radius: 4px; }
    .alert-box-success { background: #d1fae5; border-left: 4px solid #10b981; padding: 16px; margin: 20px 0; border-radius: 4px; }
    .alert-box-info { background: #dbeafe; border-left: 4px solid #3b82f6; padding: 16px; margin: 20px 0; border-radius: 4px; }
  </style>
</head>
<body>
  <div class="container">
    <div class="header">${headerContent}</div>
    <div class="content">${bodyContent}</div>
    <div class="footer">
      <p>${CLUB_NAME}</p>
      <p><a href="${siteUrl}">Visit the club site</a></p>
    </div>
  </div>
</body>
</html>`;
  }

  // ============================================================================
  // Template Renderers
  // ============================================================================

  private renderRegistrationConfirmation(data: EmailContext): RenderedEmail {
    const template = EmailTemplate.REGISTRATION_CONFIRMATION;
    const fullName = this.required(template, data, 'fullName');
    const regNumber = this.required(template, data, 'regNumber');
    const departmentName = this.optional(data, 'departmentName', 'your chosen department');

    const html = this.wrapInLayout(
      `<h1>Welcome to ${CLUB_NAME}</h1>`,
      `<p>Hi ${this.escapeHtml(fullName)},</p>
      <p>Your registration has been received and is <strong>pending approval</strong>.</p>
      <div class="alert-box-info">
        <p><strong>Registration number:</strong> ${this.escapeHtml(regNumber)}</p>
        <p><strong>Department:</strong> ${this.escapeHtml(departmentName)}</p>
      </div>
      <p>A department leader or administrator will review your account. You will receive another email once a decision has been made.</p>`,
      data,
    );
    const text = `Welcome to ${CLUB_NAME}\n\nHi ${fullName},\n\nYour account has been created and is pending approval.\n\nRegistration number: ${regNumber}\nDepartment: ${departmentName}`;

    return { html, text };
  }

  private renderStaffNewRegistration(data: EmailContext): RenderedEmail {
    const template = EmailTemplate.STAFF_NEW_REGISTRATION;
    const fullName = this.required(template, data, 'fullName');
    const regNumber = this.required(template, data, 'regNumber');
    const email = this.required(template, data, 'email');
    const departmentName = this.optional(data, 'departmentName', 'Unknown department');
    const registeredAt = this.optional(data, 'registeredAt');
    const reviewUrl = this.escapeHtml(this.optional(data, 'reviewUrl', '#'));

    const html = this.wrapInLayout(
      '<h1>New Registration</h1>',
      `<p>A new member has registered and is waiting for review.</p>
      <div class="alert-box-info">
        <p><strong>Name:</strong> ${this.escapeHtml(fullName)}</p>
        <p><strong>Registration number:</strong> ${this.escapeHtml(regNumber)}</p>
        <p><strong>Email:</strong> ${this.escapeHtml(email)}</p>
        <p><strong>Department:</strong> ${this.escapeHtml(departmentName)}</p>
        ${registeredAt ? `<p><strong>Registered:</strong> ${this.escapeHtml(registeredAt)}</p>` : ''}
      </div>
      <a href="${reviewUrl}" class="button">Review Pending Members</a>`,
      data,
    );
    const text = `New member registration from ${fullName}\n\nRegistration number: ${regNumber}\nEmail: ${email}\nDepartment: ${departmentName}${registeredAt ? `\nRegistered: ${registeredAt}` : ''}`;

    return { html, text };
  }

  private renderMemberApproved(data: EmailContext): RenderedEmail {
    const template = EmailTemplate.MEMBER_APPROVED;
    const fullName = this.required(template, data, 'fullName');
    const pictureDeadline = this.optional(data, 'pictureDeadline');
    const uploadUrl = this.escapeHtml(this.optional(data, 'uploadUrl', '#'));

    const html = this.wrapInLayout(
      '<h1>Your Account Has Been Approved!</h1>',
      `<p>Hi ${this.escapeHtml(fullName)},</p>
      <div class="alert-box-success">
        <p>Congratulations! Your ${CLUB_NAME} membership has been approved.</p>
      </div>
      ${
        pictureDeadline
          ? `<div class="alert-box-warning">
        <p><strong>Action required:</strong> upload a profile picture before <strong>${this.escapeHtml(pictureDeadline)}</strong>. Access to member pages is restricted after this deadline until a picture is uploaded.</p>
      </div>
      <a href="${uploadUrl}" class="button">Upload Picture</a>`
          : ''
      }`,
      data,
    );
    const text = `Congratulations! Your account has been approved.\n\nHi ${fullName},\n\nYour ${CLUB_NAME} membership is now active.${pictureDeadline ? `\n\nPlease upload your profile picture before ${pictureDeadline}.` : ''}`;

    return { html, text };
  }

  private renderMemberRejected(data: EmailContext): RenderedEmail {
    const template = EmailTemplate.MEMBER_REJECTED;
    const fullName = this.required(template, data, 'fullName');
    const reason = this.optional(data, 'reason');

    const html = this.wrapInLayout(
      '<h1>Registration Status Update</h1>',
      `<p>Hi ${this.escapeHtml(fullName)},</p>
      <p>Thank you for your interest in ${CLUB_NAME}. After review, your registration was not approved.</p>
      ${reason ? `<div class="alert-box-warning"><p><strong>Reason:</strong> ${this.escapeHtml(reason)}</p></div>` : ''}
      <p>If you believe this is a mistake, please contact the club leadership.</p>`,
      data,
    );
    const text = `Thank you for your interest in ${CLUB_NAME}.\n\nHi ${fullName},\n\nYour registration was not approved.${reason ? `\n\nReason: ${reason}` : ''}`;

    return { html, text };
  }

  private renderPictureReminder(data: EmailContext): RenderedEmail {
    const template = EmailTemplate.PICTURE_REMINDER;
    const fullName = this.required(template, data, 'fullName');
    const deadline = this.required(template, data, 'deadline');
    const uploadUrl = this.escapeHtml(this.optional(data, 'uploadUrl', '#'));

    const html = this.wrapInLayout(
      '<h1>Picture Upload Reminder</h1>',
      `<p>Hi ${this.escapeHtml(fullName)},</p>
      <div class="alert-box-warning">
        <p>Your profile picture is still missing. Please upload it before <strong>${this.escapeHtml(deadline)}</strong>.</p>
      </div>
      <a href="${uploadUrl}" class="button">Upload Picture</a>`,
      data,
    );
    const text = `Please upload your profile picture.\n\nHi ${fullName},\n\nYour profile picture is due before ${deadline}.`;

    return { html, text };
  }

  private renderAnnouncement(data: EmailContext): RenderedEmail {
    const template = EmailTemplate.ANNOUNCEMENT;
    const title = this.required(template, data, 'title');
    const message = this.optional(data, 'message');

    const paragraphs = message
      .split(/\n{2,}/)
      .filter((p) => p.trim())
      .map((p) => `<p>${this.escapeHtml(p.trim()).replace(/\n/g, '<br>')}</p>`)
      .join('\n      ');

    const html = this.wrapInLayout(
      `<h1>${this.escapeHtml(title)}</h1>`,
      paragraphs || '<p>See the club site for details.</p>',
      data,
    );
    const text = `${title}\n\n${message}`;

    return { html, text };
  }

  private renderContactMessage(data: EmailContext): RenderedEmail {
    const template = EmailTemplate.CONTACT_MESSAGE;
    const name = this.required(template, data, 'name');
    const email = this.required(template, data, 'email');
    const subject = this.required(template, data, 'subject');
    const message = this.required(template, data, 'message');

    const html = this.wrapInLayout(
      '<h1>New Contact Message</h1>',
      `<div class="alert-box-info">
        <p><strong>From:</strong> ${this.escapeHtml(name)} &lt;${this.escapeHtml(email)}&gt;</p>
        <p><strong>Subject:</strong> ${this.escapeHtml(subject)}</p>
      </div>
      <p>${this.escapeHtml(message).replace(/\n/g, '<br>')}</p>`,
      data,
    );
    const text = `New contact message from ${name} <${email}>\n\nSubject: ${subject}\n\n${message}`;

    return { html, text };
  }

  private renderTestEmail(data: EmailContext): RenderedEmail {
    const recipientEmail = this.optional(data, 'recipientEmail', 'you');
    const timestamp = this.optional(data, 'timestamp');

    const html = this.wrapInLayout(
      '<h1>Test Email</h1>',
      `<div class="alert-box-success">
        <p>This is a test email from ${CLUB_NAME}. If ${this.escapeHtml(recipientEmail)} received this, email configuration is working correctly!</p>
      </div>
      ${timestamp ? `<p>Sent at ${this.escapeHtml(timestamp)}</p>` : ''}`,
      data,
    );
    const text = `This is a test email from ${CLUB_NAME}. If you received this, email configuration is working correctly!${timestamp ? `\n\nSent at ${timestamp}` : ''}`;

    return { html, text };
  }
}
