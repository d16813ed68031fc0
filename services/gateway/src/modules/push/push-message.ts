import { parseXmlFields, toXml, type XmlValue } from '@wxgate/adapters';
import { classifyPush, ValidationError, type PushFields } from '@wxgate/domain';

export interface VideoReply {
  mediaId: string;
  title?: string;
  description?: string;
}

export interface MusicReply {
  title: string;
  description: string;
  musicUrl: string;
  hqMusicUrl: string;
  thumbMediaId?: string;
}

export interface NewsArticle {
  title?: string;
  description?: string;
  picUrl?: string;
  url?: string;
}

function requireField(fields: PushFields, name: string): string {
  const value = fields[name];
  if (!value) {
    throw new ValidationError(name, `Push payload has no ${name}.`);
  }
  return value;
}

function definedTags(tags: Record<string, string | undefined>): { [tag: string]: XmlValue } {
  const result: { [tag: string]: XmlValue } = {};
  for (const [tag, value] of Object.entries(tags)) {
    if (value !== undefined) {
      result[tag] = value;
    }
  }
  return result;
}

/**
 * One inbound push from the provider, with builders for the passive reply.
 * A reply swaps sender and recipient: it goes to the user who pushed.
 */
export class PushMessage {
  readonly type: string;
  readonly fromUser: string;
  readonly toUser: string;

  constructor(
    readonly fields: PushFields,
    private readonly clock: () => Date = () => new Date()
  ) {
    this.type = classifyPush(fields);
    this.fromUser = requireField(fields, 'FromUserName');
    this.toUser = requireField(fields, 'ToUserName');
  }

  static parse(xml: string, clock?: () => Date): PushMessage {
    return new PushMessage(parseXmlFields(xml), clock);
  }

  get(name: string): string | undefined {
    return this.fields[name];
  }

  replyText(text: string): string {
    return this.reply('text', { Content: text });
  }

  replyImage(mediaId: string): string {
    return this.reply('image', { Image: { MediaId: mediaId } });
  }

  replyVoice(mediaId: string): string {
    return this.reply('voice', { Voice: { MediaId: mediaId } });
  }

  replyVideo(video: VideoReply): string {
    return this.reply('video', {
      Video: definedTags({ MediaId: video.mediaId, Title: video.title, Description: video.description })
    });
  }

  replyMusic(music: MusicReply): string {
    return this.reply('music', {
      Music: definedTags({
        Title: music.title,
        Description: music.description,
        MusicUrl: music.musicUrl,
        HQMusicUrl: music.hqMusicUrl,
        ThumbMediaId: music.thumbMediaId
      })
    });
  }

  replyNews(articles: readonly NewsArticle[]): string {
    if (articles.length === 0) {
      throw new ValidationError('articles', 'A news reply needs at least one article.');
    }

    const items = articles.map((article) =>
      definedTags({ Title: article.title, Description: article.description, PicUrl: article.picUrl, Url: article.url })
    );

    return this.reply('news', { ArticleCount: articles.length, Articles: { item: items } });
  }

  private reply(msgType: string, body: { [tag: string]: XmlValue }): string {
    return toXml({
      ToUserName: this.fromUser,
      FromUserName: this.toUser,
      CreateTime: Math.floor(this.clock().getTime() / 1000),
      MsgType: msgType,
      ...body
    });
  }
}
