import { Controller, Inject } from '@nestjs/common';
import { MessagePattern, Payload } from '@nestjs/microservices';
import { createUuidPipe } from '../common/validation';
import { TankService } from '../services/tank.service';
import { Unit } from '../entities/unit.entity';
import { Tank } from '../entities/tank.entity';
import { CreateTankDto } from '../dtos/create-tank.dto';
import { UpdateTankDto } from '../dtos/update-tank.dto';
import { TankLabelDto } from '../dtos/tank-label.dto';
import { LowCapacityFilterDto } from '../dtos/low-capacity-filter.dto';
import { TankResponseDto } from '../dtos/tank-response.dto';
import { TankDetailsResponseDto } from '../dtos/tank-details-response.dto';
import { TankMapper } from '../mappers/tanks.mappers';
import { CELLAR_CONFIG, CellarConfig } from '../config/cellar.config';

@Controller()
export class TanksController {
  constructor(
    private readonly tankService: TankService,
    @Inject(CELLAR_CONFIG)
    private readonly config: CellarConfig,
  ) {}

  @MessagePattern({ cmd: 'list_tanks' })
  async listTanks(): Promise<TankResponseDto[]> {
    return this.toResponses(await this.tankService.listAll());
  }

  @MessagePattern({ cmd: 'list_all_tanks' })
  async listAllTanks(): Promise<TankResponseDto[]> {
    return this.toResponses(await this.tankService.listAllIncludingDeleted());
  }

  @MessagePattern({ cmd: 'list_deleted_tanks' })
  async listDeletedTanks(): Promise<TankResponseDto[]> {
    return this.toResponses(await this.tankService.listDeleted());
  }

  @MessagePattern({ cmd: 'list_available_tanks' })
  async listAvailableTanks(): Promise<TankResponseDto[]> {
    return this.toResponses(await this.tankService.listAvailable());
  }

  @MessagePattern({ cmd: 'list_occupied_tanks' })
  async listOccupiedTanks(): Promise<TankResponseDto[]> {
    return this.toResponses(await this.tankService.listOccupied());
  }

  @MessagePattern({ cmd: 'list_low_capacity_tanks' })
  async listLowCapacityTanks(@Payload() filter: LowCapacityFilterDto): Promise<TankResponseDto[]> {
    const threshold = filter.thresholdPercent ?? this.config.lowCapacityPercent;
    const tanks = await this.tankService.listLowCapacity(threshold);
    return tanks.map((tank) => TankMapper.toResponse(tank, threshold));
  }

  @MessagePattern({ cmd: 'get_tank' })
  async getTank(@Payload(createUuidPipe()) tankId: string): Promise<TankResponseDto> {
    return this.toResponse(await this.tankService.getById(tankId));
  }

  @MessagePattern({ cmd: 'get_tank_by_label' })
  async getTankByLabel(@Payload() dto: TankLabelDto): Promise<TankResponseDto> {
    return this.toResponse(await this.tankService.getByLabel(dto.label));
  }

  @MessagePattern({ cmd: 'get_tank_details' })
  async getTankDetails(@Payload() dto: TankLabelDto): Promise<TankDetailsResponseDto> {
    const details = await this.tankService.getDetails(dto.label);
    return TankMapper.toDetailsResponse(details, this.config.lowCapacityPercent);
  }

  @MessagePattern({ cmd: 'create_tank' })
  async createTank(@Payload() dto: CreateTankDto): Promise<TankResponseDto> {
    return this.toResponse(await this.tankService.create(dto.label, dto.capacity));
  }

  @MessagePattern({ cmd: 'update_tank' })
  async updateTank(@Payload() dto: UpdateTankDto): Promise<TankResponseDto> {
    const { label, newLabel, newCapacity } = dto;
    return this.toResponse(await this.tankService.update(label, { newLabel, newCapacity }));
  }

  @MessagePattern({ cmd: 'soft_delete_tank' })
  async softDeleteTank(@Payload() dto: TankLabelDto): Promise<TankResponseDto> {
    return this.toResponse(await this.tankService.softDelete(dto.label));
  }

  @MessagePattern({ cmd: 'restore_tank' })
  async restoreTank(@Payload() dto: TankLabelDto): Promise<TankResponseDto> {
    return this.toResponse(await this.tankService.restore(dto.label));
  }

  @MessagePattern({ cmd: 'list_volume_units' })
  async listVolumeUnits(): Promise<Unit[]> {
    return await this.tankService.listVolumeUnits();
  }

  private toResponse(tank: Tank): TankResponseDto {
    return TankMapper.toResponse(tank, this.config.lowCapacityPercent);
  }

  private toResponses(tanks: Tank[]): TankResponseDto[] {
    return tanks.map((tank) => this.toResponse(tank));
  }
}
