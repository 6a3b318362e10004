import { ApiProperty } from '@nestjs/swagger';

export class ProviderDto {
  @ApiProperty()
  userId!: string;

  @ApiProperty()
  businessName!: string;

  @ApiProperty()
  categoryId!: number;

  @ApiProperty({ type: 'string', nullable: true })
  bio!: string | null;

  @ApiProperty({ type: 'string', nullable: true, example: '45.00' })
  hourlyRate!: string | null;

  @ApiProperty({ type: 'string', nullable: true })
  serviceArea!: string | null;

  @ApiProperty({ type: 'number', nullable: true })
  experienceYears!: number | null;

  @ApiProperty()
  verified!: boolean;

  @ApiProperty()
  available!: boolean;

  @ApiProperty({ example: '4.5' })
  rating!: string;

  @ApiProperty()
  totalRatings!: number;

  @ApiProperty()
  createdAt!: string;

  @ApiProperty()
  updatedAt!: string;
}

export class CategoryDto {
  @ApiProperty()
  id!: number;

  @ApiProperty()
  name!: string;

  @ApiProperty()
  slug!: string;

  @ApiProperty({ type: 'string', nullable: true })
  description!: string | null;

  @ApiProperty({ type: 'string', nullable: true })
  icon!: string | null;

  @ApiProperty()
  displayOrder!: number;

  @ApiProperty({ description: 'Verified providers in this category' })
  providerCount!: number;
}

export class UpdateAvailabilityRequestDto {
  @ApiProperty()
  available!: boolean;
}

export class ProviderResponseDto {
  @ApiProperty({ type: ProviderDto })
  data!: ProviderDto;
}

export class ProviderPageResponseDto {
  @ApiProperty({ type: [ProviderDto] })
  data!: ProviderDto[];

  @ApiProperty()
  page!: number;

  @ApiProperty()
  size!: number;

  @ApiProperty()
  totalElements!: number;

  @ApiProperty()
  totalPages!: number;
}

export class CategoryListResponseDto {
  @ApiProperty({ type: [CategoryDto] })
  data!: CategoryDto[];
}
