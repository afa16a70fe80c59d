import { TransportException } from './exceptions';

/**
 * A fetch refspec such as `+refs/heads/*:refs/remotes/origin/*`.
 *
 * Names are matched as latin1 strings so that every byte of a ref name
 * survives the mapping unchanged.
 */
export class Refspec {
  private static readonly FORCE_PREFIX = '+';
  private static readonly NEGATIVE_PREFIX = '^';
  private static readonly WILDCARD = '*';

  private constructor(
    readonly force: boolean,
    readonly source: string,
    readonly destination: string
  ) {}

  static parse(spec: string): Refspec {
    const force = spec.startsWith(Refspec.FORCE_PREFIX);
    const body = force ? spec.substring(1) : spec;
    const colon = body.indexOf(':');
    const source = colon === -1 ? body : body.substring(0, colon);
    const destination = colon === -1 ? '' : body.substring(colon + 1);

    const wildcards = (value: string) => value.split(Refspec.WILDCARD).length - 1;
    if (!source || wildcards(source) > 1 || wildcards(source) !== wildcards(destination)) {
      throw new TransportException(`invalid refspec '${spec}'`);
    }
    return new Refspec(force, source, destination);
  }

  /**
   * Parse configured refspecs; negative ones and those without a destination
   * are ignored.
   */
  static parseAll(specs: string[]): Refspec[] {
    return specs
      .filter((spec) => !spec.startsWith(Refspec.NEGATIVE_PREFIX))
      .map((spec) => Refspec.parse(spec))
      .filter((refspec) => refspec.destination !== '');
  }

  static defaultFor(remote: string): Refspec {
    return new Refspec(true, 'refs/heads/*', `refs/remotes/${remote}/*`);
  }

  /**
   * Local name for the remote ref `name`, or null when it is not covered
   */
  mapToDestination(name: string): string | null {
    return Refspec.translate(name, this.source, this.destination);
  }

  /**
   * Remote name that would produce the local ref `name`
   */
  mapToSource(name: string): string | null {
    return Refspec.translate(name, this.destination, this.source);
  }

  private static translate(name: string, from: string, to: string): string | null {
    const star = from.indexOf(Refspec.WILDCARD);
    if (star === -1) return name === from ? to : null;

    const prefix = from.substring(0, star);
    const suffix = from.substring(star + 1);
    if (name.length < prefix.length + suffix.length) return null;
    if (!name.startsWith(prefix) || !name.endsWith(suffix)) return null;

    const matched = name.substring(prefix.length, name.length - suffix.length);
    if (matched === '') return null;
    return to.replace(Refspec.WILDCARD, () => matched);
  }
}
