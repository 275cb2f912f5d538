import { Entity, Property, OneToMany, Collection, Index, Unique } from '@mikro-orm/core';
import { BaseEntity } from '../../../common/entities/base.entity';
import { Container } from './container.entity';

@Entity({ tableName: 'images' })
@Index({ name: 'idx_image_is_active', properties: ['isActive'] })
export class Image extends BaseEntity {
  @Property({ length: 255 })
  @Unique({ name: 'uq_image_name' })
  name!: string;

  @Property({ length: 500 })
  image!: string;

  @Property({ default: true })
  isActive: boolean = true;

  @OneToMany(() => Container, container => container.image)
  containers = new Collection<Container>(this);
}
