import { ReplaySubject, map } from 'rxjs';
import type { Observable } from 'rxjs';
import type { InstallationInfo, ResolvedLinkData } from './types';

/**
 * Typed broadcast channels for resolved links and reinstall detection.
 *
 * Each channel keeps only the latest value: a subscriber that attaches after
 * a publish still receives it, and a newer publish replaces an unconsumed
 * older one.
 */
export class LinkEventBus {
  private readonly dynamic = new ReplaySubject<ResolvedLinkData>(1);
  private readonly unified = new ReplaySubject<ResolvedLinkData>(1);
  private readonly reinstall = new ReplaySubject<InstallationInfo>(1);

  // Every delivery is a fresh copy, so one subscriber's edits stay its own
  readonly dynamicLinks$: Observable<ResolvedLinkData> = this.dynamic.pipe(map(copyLink));
  readonly unifiedLinks$: Observable<ResolvedLinkData> = this.unified.pipe(map(copyLink));
  readonly reinstall$: Observable<InstallationInfo> = this.reinstall.pipe(map((info) => ({ ...info })));

  /**
   * Publish on the channel matching the link type
   */
  publishLink(data: ResolvedLinkData): void {
    const channel = data.type === 'unified' ? this.unified : this.dynamic;
    channel.next(copyLink(data));
  }

  publishReinstall(info: InstallationInfo): void {
    this.reinstall.next({ ...info });
  }

  close(): void {
    this.dynamic.complete();
    this.unified.complete();
    this.reinstall.complete();
  }
}

/**
 * Copy of a link with its own parameter, metadata and tag maps
 */
export function copyLink(data: ResolvedLinkData): ResolvedLinkData {
  return {
    ...data,
    ...(data.parameters && { parameters: { ...data.parameters } }),
    ...(data.metadata && { metadata: { ...data.metadata } }),
    ...(data.socialMediaTags && { socialMediaTags: { ...data.socialMediaTags } }),
  };
}
