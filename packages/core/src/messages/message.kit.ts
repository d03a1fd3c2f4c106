import {
  ContainerBuilder,
  MediaGalleryBuilder,
  MediaGalleryItemBuilder,
  SectionBuilder,
  SeparatorBuilder,
  SeparatorSpacingSize,
  TextDisplayBuilder,
  ThumbnailBuilder,
} from 'discord.js';
import type { HeraldConfig, MessageCategory } from '@herald/shared';
import { formatHeading, resolveAccent } from '../styles/category.styles.js';
import { replyPayload, type PayloadOptions, type ReplyPayload } from './message.payload.js';

const MAX_GALLERY_ITEMS = 10;

export interface MessageField {
  name: string;
  value: string;
}

export interface MediaItem {
  url: string;
  description?: string;
}

export interface ContainerOptions {
  /** Replaces the category's default heading text */
  title?: string;
  thumbnailUrl?: string;
  fields?: MessageField[];
  media?: MediaItem[];
  /** Rendered as subtext under a divider */
  footer?: string;
}

export type MessageOptions = ContainerOptions & PayloadOptions;

const DEFAULT_BODIES: Partial<Record<MessageCategory, string>> = {
  'permission-denied': 'You do not have permission to use this command.',
  'no-data': 'There is nothing to show yet.',
};

function text(content: string): TextDisplayBuilder {
  return new TextDisplayBuilder().setContent(content);
}

/**
 * Composes category-styled Components V2 containers and wraps them in payloads
 * that carry the V2 flag and suppress mention parsing.
 */
export class MessageKit {
  constructor(private readonly config: Pick<HeraldConfig, 'palette' | 'heading'>) {}

  container(category: MessageCategory, body: string, options: ContainerOptions = {}): ContainerBuilder {
    const heading = formatHeading(category, options.title, this.config.heading.level);
    const container = new ContainerBuilder().setAccentColor(
      resolveAccent(category, this.config.palette),
    );

    const blocks = body ? [text(heading), text(body)] : [text(heading)];

    if (options.thumbnailUrl) {
      container.addSectionComponents(
        new SectionBuilder()
          .addTextDisplayComponents(blocks)
          .setThumbnailAccessory(new ThumbnailBuilder().setURL(options.thumbnailUrl)),
      );
    } else {
      container.addTextDisplayComponents(blocks);
    }

    return this.appendExtras(container, options);
  }

  /** A container with no category heading, accented with the primary tone. */
  plain(blocks: string[], options: Omit<ContainerOptions, 'title'> = {}): ContainerBuilder {
    if (blocks.length === 0) {
      throw new Error('A plain container needs at least one text block');
    }
    const container = new ContainerBuilder()
      .setAccentColor(this.config.palette.primary)
      .addTextDisplayComponents(blocks.map(text));
    return this.appendExtras(container, options);
  }

  payload(containers: ContainerBuilder | ContainerBuilder[], options: PayloadOptions = {}): ReplyPayload {
    return replyPayload(containers, options);
  }

  error(body: string, options: MessageOptions = {}): ReplyPayload {
    return this.message('error', body, options);
  }

  success(body: string, options: MessageOptions = {}): ReplyPayload {
    return this.message('success', body, options);
  }

  warning(body: string, options: MessageOptions = {}): ReplyPayload {
    return this.message('warning', body, options);
  }

  info(body: string, options: MessageOptions = {}): ReplyPayload {
    return this.message('info', body, options);
  }

  permissionDenied(body?: string, options: MessageOptions = {}): ReplyPayload {
    return this.message('permission-denied', body ?? DEFAULT_BODIES['permission-denied'], options);
  }

  /**
   * Shows the correct invocation, e.g. `usage('/remind <time> <text>')`,
   * optionally after the reason the call was rejected.
   */
  usage(syntax: string, options: MessageOptions & { reason?: string } = {}): ReplyPayload {
    const { reason, ...rest } = options;
    const line = `Usage: \`${syntax}\``;
    return this.message('usage', reason ? `${reason}\n${line}` : line, rest);
  }

  noData(body?: string, options: MessageOptions = {}): ReplyPayload {
    return this.message('no-data', body ?? DEFAULT_BODIES['no-data'], options);
  }

  message(category: MessageCategory, body: string | undefined, options: MessageOptions = {}): ReplyPayload {
    const { ephemeral, ...containerOptions } = options;
    return replyPayload(this.container(category, body ?? '', containerOptions), { ephemeral });
  }

  private appendExtras(container: ContainerBuilder, options: ContainerOptions): ContainerBuilder {
    const fields = options.fields ?? [];
    if (fields.length > 0) {
      container.addSeparatorComponents(
        new SeparatorBuilder().setDivider(false).setSpacing(SeparatorSpacingSize.Small),
      );
      container.addTextDisplayComponents(
        fields.map((field) => text(`**${field.name}**\n${field.value}`)),
      );
    }

    const media = options.media ?? [];
    if (media.length > MAX_GALLERY_ITEMS) {
      throw new Error(`A media gallery holds at most ${MAX_GALLERY_ITEMS} items, got ${media.length}`);
    }
    if (media.length > 0) {
      container.addMediaGalleryComponents(
        new MediaGalleryBuilder().addItems(
          media.map((item) => {
            const builder = new MediaGalleryItemBuilder().setURL(item.url);
            return item.description ? builder.setDescription(item.description) : builder;
          }),
        ),
      );
    }

    if (options.footer) {
      container.addSeparatorComponents(
        new SeparatorBuilder().setDivider(true).setSpacing(SeparatorSpacingSize.Small),
      );
      container.addTextDisplayComponents(text(`-# ${options.footer}`));
    }

    return container;
  }
}
