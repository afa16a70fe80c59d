import { ObjectException } from '@/core/exceptions';

/**
 * Commit Person Structure:
 * ┌─────────────────────────────────────────────────────────────────┐
 * │ Name <email> timestamp timezone                                 │
 * └─────────────────────────────────────────────────────────────────┘
 *
 * `timezone` is kept in its "+HHMM" form.
 */
export class CommitPerson {
  constructor(
    readonly name: string,
    readonly email: string,
    readonly timestamp: number,
    readonly timezone: string = '+0000'
  ) {}

  /**
   * Formats person information in Git's standard format:
   * "Name <email> timestamp timezone"
   */
  formatForGit(): string {
    return `${this.name} <${this.email}> ${this.timestamp} ${this.timezone}`;
  }

  /**
   * Timezone offset in minutes east of UTC.
   */
  offsetMinutes(): number {
    const sign = this.timezone.startsWith('-') ? -1 : 1;
    const hours = parseInt(this.timezone.substring(1, 3), 10);
    const minutes = parseInt(this.timezone.substring(3, 5), 10);
    return sign * (hours * 60 + minutes);
  }

  /**
   * Parses person information from Git's format. Names may be empty and emails
   * need not contain '@': both occur in real histories.
   */
  static parseFromGit(gitFormat: string): CommitPerson {
    const matcher = /^(.*?) ?<([^>]*)> (\d+) ([+-]\d{4})$/.exec(gitFormat);
    if (!matcher) {
      throw new ObjectException(`Invalid person format: ${gitFormat}`);
    }

    const [, name = '', email = '', epochSeconds = '0', timezone = '+0000'] = matcher;
    return new CommitPerson(name, email, parseInt(epochSeconds, 10), timezone);
  }
}
