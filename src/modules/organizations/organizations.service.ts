import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { QueryFailedError, Repository } from 'typeorm';
import { Organization } from '../../entities/organization.entity';
import { errorCode } from '../../utils/error.util';

export interface ResolvedOrganization {
  organization: Organization;
  created: boolean;
}

@Injectable()
export class OrganizationsService {
  constructor(
    @InjectRepository(Organization)
    private readonly organizationsRepository: Repository<Organization>,
  ) {}

  async findByName(name: string): Promise<Organization | null> {
    return this.organizationsRepository.findOne({ where: { name: name.trim() } });
  }

  /**
   * Names are unique. Two registrations racing on a new name both end up in
   * the one organization; only the first is reported as `created`.
   */
  async findOrCreate(name: string): Promise<ResolvedOrganization> {
    const existing = await this.findByName(name);
    if (existing) {
      return { organization: existing, created: false };
    }

    try {
      const organization = await this.organizationsRepository.save(
        this.organizationsRepository.create({ name: name.trim() }),
      );
      return { organization, created: true };
    } catch (error) {
      // 23505 unique_violation
      if (
        error instanceof QueryFailedError &&
        errorCode(error.driverError) === '23505'
      ) {
        const winner = await this.findByName(name);
        if (winner) {
          return { organization: winner, created: false };
        }
      }
      throw error;
    }
  }

  async delete(id: string): Promise<void> {
    await this.organizationsRepository.delete({ id });
  }
}
