import { Entity, PrimaryGeneratedColumn, Column, CreateDateColumn, ManyToOne, JoinColumn } from 'typeorm';
import { Session } from './session.entity';

@Entity('messages')
export class Message {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column('integer', { name: 'session_id', nullable: true })
  sessionId!: number | null;

  @Column('text')
  role!: string; // 'user' | 'assistant'

  @Column('text')
  content!: string;

  // Serialized MessageMetadata; NULL means nothing was recorded.
  @Column('text', { nullable: true })
  metadata!: string | null;

  @CreateDateColumn({ type: 'datetime' })
  timestamp!: Date;

  @ManyToOne(() => Session, session => session.messages, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'session_id' })
  session!: Session;
}
