import { Entity, PrimaryColumn, Column, CreateDateColumn, UpdateDateColumn } from 'typeorm';

// The `embedding VECTOR(n)` column is written and searched with raw SQL in PgVectorJobStore.
@Entity({ name: 'job_postings' })
export class JobPostingEntity {
  @PrimaryColumn({ type: 'text' })
  id!: string;

  @Column({ type: 'text' })
  title!: string;

  @Column({ type: 'text', default: '' })
  company!: string;

  @Column({ type: 'text' })
  description!: string;

  @Column({ name: 'required_skills', type: 'text', default: '' })
  requiredSkills!: string;

  @Column({ type: 'text', default: '' })
  location!: string;

  @Column({ name: 'salary_range', type: 'text', default: '' })
  salaryRange!: string;

  @Column({ name: 'experience_level', type: 'text', default: '' })
  experienceLevel!: string;

  @Column({ name: 'education_requirements', type: 'text', default: '' })
  educationRequirements!: string;

  @CreateDateColumn({ name: 'created_at' })
  createdAt!: Date;

  @UpdateDateColumn({ name: 'updated_at' })
  updatedAt!: Date;
}
