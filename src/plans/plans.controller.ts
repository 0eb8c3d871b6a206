import {
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  Param,
  ParseBoolPipe,
  ParseIntPipe,
  Patch,
  Post,
  Query,
  UsePipes,
  ValidationPipe,
} from '@nestjs/common'
import { ReconciliationService } from '../completion-matching/reconciliation.service'
import { PlanAdjustmentsService } from '../plan-adjustments/plan-adjustments.service'
import { PlanMaterializerService } from '../plan-materializer/plan-materializer.service'
import { AdjustPlanDto, GeneratePlanDto, MaterializePlanDto, ReconcileActivitiesDto } from './dto/plans.dto'
import { PlansService } from './plans.service'

@Controller('plans')
export class PlansController {
  constructor(
    private readonly plansService: PlansService,
    private readonly materializer: PlanMaterializerService,
    private readonly reconciliation: ReconciliationService,
    private readonly adjustments: PlanAdjustmentsService,
  ) {}

  @Post()
  @UsePipes(new ValidationPipe({ whitelist: true, forbidNonWhitelisted: true }))
  materialize(@Body() body: MaterializePlanDto) {
    return this.materializer.materializePlan(body.document, body.shape, {
      anchorDate: body.anchorDate,
      name: body.name,
      goal: body.goal,
    })
  }

  @Post('generate')
  @UsePipes(new ValidationPipe({ whitelist: true, forbidNonWhitelisted: true, transform: true }))
  generate(@Body() body: GeneratePlanDto) {
    return this.plansService.generatePlan(body)
  }

  @Post('reconcile')
  @HttpCode(200)
  @UsePipes(new ValidationPipe({ whitelist: true, forbidNonWhitelisted: true }))
  reconcileActive(@Body() body: ReconcileActivitiesDto) {
    return this.reconciliation.reconcileActivePlans(body.activities)
  }

  @Get()
  list(@Query('activeOnly', new ParseBoolPipe({ optional: true })) activeOnly?: boolean) {
    return this.plansService.listPlans({ activeOnly: activeOnly ?? false })
  }

  @Get(':id')
  details(@Param('id', ParseIntPipe) id: number) {
    return this.plansService.getPlanDetails(id)
  }

  @Patch(':id/deactivate')
  deactivate(@Param('id', ParseIntPipe) id: number) {
    return this.plansService.deactivatePlan(id)
  }

  @Delete(':id')
  remove(@Param('id', ParseIntPipe) id: number) {
    return this.plansService.deletePlan(id)
  }

  @Post(':id/reconcile')
  @HttpCode(200)
  @UsePipes(new ValidationPipe({ whitelist: true, forbidNonWhitelisted: true }))
  reconcile(@Param('id', ParseIntPipe) id: number, @Body() body: ReconcileActivitiesDto) {
    return this.reconciliation.reconcileActivities(id, body.activities)
  }

  @Post(':id/adjust')
  @HttpCode(200)
  @UsePipes(new ValidationPipe({ whitelist: true, forbidNonWhitelisted: true }))
  adjust(@Param('id', ParseIntPipe) id: number, @Body() body: AdjustPlanDto) {
    return this.adjustments.adjustPlan(id, body.readiness, body.mode)
  }
}
